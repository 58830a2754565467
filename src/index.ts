export { runDepsum, collectInputFiles } from './runner/run.js'
export type { RunOptions, RunResult } from './runner/types.js'
export { loadConfig, parseConfig, resolveBaseDir } from './config/loader.js'
export type { DepsumConfig, PathRule, RuleActions, LoadedConfig } from './config/types.js'
export { FileVisitor } from './relation-engine/visitor.js'
export { PythonModuleResolver } from './python-resolver/resolver.js'
export { parsePythonImports } from './python-resolver/imports.js'
export { buildRelationGraph } from './graph/builder.js'
export type { RelationGraph } from './graph/types.js'
export { buildClosure } from './hasher/closure.js'
export { computeDependencyHash, computeFileHashes, ALGORITHM_VERSION } from './hasher/hash.js'
export { runHashPipeline } from './hasher/pipeline.js'
export * from './utils/errors.js'
