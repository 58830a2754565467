// src/relation-engine/visitor.ts
import { readFile } from 'fs/promises'
import { join, posix } from 'path'
import type { DepsumConfig, RuleActions } from '../config/types.js'
import type { PythonImports } from '../python-resolver/types.js'
import { parsePythonImports } from '../python-resolver/imports.js'
import { PythonModuleResolver, isUnderRootPackage } from '../python-resolver/resolver.js'
import { GlobMatcher, globFiles } from './glob.js'
import { applyTemplates, capturesOf, NO_CAPTURES, type Captures } from './template.js'
import { FileSystemError, PatternError, ResolveError, errorMessage, withContext } from '../utils/errors.js'
import { verbose } from '../utils/logger.js'

/**
 * State of one visitFile call. The file text is read at most once and shared
 * between regex rules and import parsing.
 */
interface VisitContext {
  file: string
  dir: string
  text?: string
  imports?: PythonImports
  relations: string[]
}

/**
 * Finds the files one file directly relates to by applying the configured
 * path rules. Holds the run's regex cache and Python resolver, neither of
 * which tolerates concurrent visits: await one visitFile before the next.
 */
export class FileVisitor {
  private config: DepsumConfig
  private baseDir: string
  private resolver: PythonModuleResolver
  private matcher: GlobMatcher
  private regexCache = new Map<string, RegExp>()

  constructor(
    config: DepsumConfig,
    baseDir: string,
    resolver: PythonModuleResolver = new PythonModuleResolver(baseDir, config.root_python_packages),
    matcher: GlobMatcher = new GlobMatcher(baseDir)
  ) {
    this.config = config
    this.baseDir = baseDir
    this.resolver = resolver
    this.matcher = matcher
  }

  /**
   * Direct relations of `file` (base_dir-relative, POSIX). Unsorted and may
   * contain duplicates; `global_deps` are not included.
   */
  async visitFile(file: string): Promise<string[]> {
    let excluded: boolean
    try {
      excluded = await this.matcher.matchesAny(this.config.global_exclude, file)
    } catch (error) {
      throw withContext('error checking global_exclude', error)
    }
    if (excluded) return []

    verbose(`Visiting: ${file}`)

    const ctx: VisitContext = { file, dir: posix.dirname(file), relations: [] }

    for (const [rulePattern, rule] of Object.entries(this.config.path_rules)) {
      let matched: boolean
      try {
        matched = await this.matcher.matches(rulePattern, file)
      } catch (error) {
        throw withContext(`error matching rule '${rulePattern}'`, error)
      }
      if (!matched) continue

      verbose(`Matched rule: ${rulePattern}`)

      try {
        if (!await this.matcher.matchesAny(rule.exclude, file)) {
          await this.applyActions(rule, ctx, NO_CAPTURES)
        }
      } catch (error) {
        throw withContext(`error while running path_rule '${rulePattern}'`, error)
      }

      for (const [regexPattern, regexActions] of Object.entries(rule.regex_rules)) {
        try {
          await this.applyRegexRule(regexPattern, regexActions, ctx)
        } catch (error) {
          throw withContext(`error while running path_rule '${rulePattern}': regex rule '${regexPattern}'`, error)
        }
      }
    }

    return ctx.relations
  }

  private async applyRegexRule(pattern: string, actions: RuleActions, ctx: VisitContext): Promise<void> {
    if (await this.matcher.matchesAny(actions.exclude, ctx.file)) return

    const text = await this.readText(ctx)
    const regex = this.compile(pattern)

    for (const match of text.matchAll(regex)) {
      const captures = capturesOf(match)
      verbose(`Matched regex rule: ${ctx.file} ${pattern} ${JSON.stringify(captures)}`)
      await this.applyActions(actions, ctx, captures)
    }
  }

  private compile(pattern: string): RegExp {
    let regex = this.regexCache.get(pattern)
    if (!regex) {
      try {
        regex = new RegExp(pattern, 'gm')
      } catch (error) {
        throw new PatternError(`invalid regular expression: ${errorMessage(error)}`, { cause: error })
      }
      this.regexCache.set(pattern, regex)
    }
    return regex
  }

  private async readText(ctx: VisitContext): Promise<string> {
    if (ctx.text === undefined) {
      const fullPath = join(this.baseDir, ctx.file)
      try {
        ctx.text = await readFile(fullPath, 'utf-8')
      } catch (error) {
        throw new FileSystemError(`failed to read '${fullPath}': ${errorMessage(error)}`, { cause: error })
      }
    }
    return ctx.text
  }

  private async applyActions(actions: RuleActions, ctx: VisitContext, captures: Captures): Promise<void> {
    for (const pattern of applyTemplates(actions.visit, captures)) {
      try {
        ctx.relations.push(...await globFiles(pattern, this.baseDir))
      } catch (error) {
        throw withContext(`error while visiting '${pattern}'`, error)
      }
    }

    for (const pattern of applyTemplates(actions.visit_siblings, captures)) {
      try {
        await this.visitRelative(pattern, ctx.dir, ctx)
      } catch (error) {
        throw withContext(`error while visiting sibling '${pattern}'`, error)
      }
    }

    const grandSiblings = applyTemplates(actions.visit_grand_siblings, captures)
    // Walk up to, but not including, base_dir itself
    for (let dir = ctx.dir; dir !== '.' && dir !== '/'; dir = posix.dirname(dir)) {
      for (const pattern of grandSiblings) {
        try {
          await this.visitRelative(pattern, dir, ctx)
        } catch (error) {
          throw withContext(`error while visiting grand sibling '${pattern}' at '${dir}'`, error)
        }
      }
    }

    const submoduleTargets = applyTemplates(actions.visit_python_all_submodules_for, captures)
    if (!actions.visit_imported_python_modules && submoduleTargets.length === 0) return

    if (!ctx.imports) {
      ctx.imports = parsePythonImports(await this.readText(ctx))
    }
    const imports = ctx.imports

    for (const target of submoduleTargets) {
      const module = this.qualify(target, imports)
      verbose(`Visiting all submodules of: ${target} -> ${module}`)
      const pattern = `${module.replaceAll('.', '/')}/**/*.py`
      try {
        ctx.relations.push(...await globFiles(pattern, this.baseDir))
      } catch (error) {
        throw withContext(`error while visiting submodule '${module}'`, error)
      }
    }

    for (const module of imports.modules) {
      try {
        ctx.relations.push(...await this.resolver.resolve(module))
      } catch (error) {
        throw withContext(`error while resolving python module '${module}'`, error)
      }
    }
  }

  private async visitRelative(pattern: string, dir: string, ctx: VisitContext): Promise<void> {
    for (const match of await globFiles(pattern, join(this.baseDir, dir))) {
      ctx.relations.push(posix.join(dir, match))
    }
  }

  private qualify(target: string, imports: PythonImports): string {
    if (isUnderRootPackage(target, this.config.root_python_packages)) return target
    const module = imports.bindings.get(target)
    if (module === undefined) {
      throw new ResolveError(`module ident '${target}' not found`)
    }
    return module
  }
}
