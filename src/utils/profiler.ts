// src/utils/profiler.ts
import { Session } from 'inspector'
import { writeFile } from 'fs/promises'

export const PROFILE_FILE = 'depsum.cpuprofile'

function post(session: Session, method: 'Profiler.enable' | 'Profiler.start'): Promise<void> {
  return new Promise((resolve, reject) => {
    session.post(method, error => (error ? reject(error) : resolve()))
  })
}

/**
 * Run `fn` under the V8 CPU profiler and write the profile (loadable in
 * Chrome DevTools) to `outPath`, whether or not `fn` succeeds.
 */
export async function withCpuProfile<T>(outPath: string, fn: () => Promise<T>): Promise<T> {
  const session = new Session()
  session.connect()
  await post(session, 'Profiler.enable')
  await post(session, 'Profiler.start')

  try {
    return await fn()
  } finally {
    const profile = await new Promise<object>((resolve, reject) => {
      session.post('Profiler.stop', (error, params) => (error ? reject(error) : resolve(params.profile)))
    })
    session.disconnect()
    await writeFile(outPath, JSON.stringify(profile))
  }
}
