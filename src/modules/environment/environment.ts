/**
 * Environment — loads, compiles, caches and renders templates.
 *
 * loadTemplate(name) runs:
 *   identity → memo → (unit not yet activated: artifact check → activate)
 *   → (still not activated: load source → compile → persist → activate)
 *   → runtime init → instantiate → memoize
 *
 * The whole pipeline is synchronous: loaders, compilers and artifact stores
 * all do blocking I/O, so a load never interleaves with another one in the
 * same process.
 */

import { randomUUID } from 'node:crypto'
import { performance } from 'node:perf_hooks'
import {
  LoaderError,
  LogicError,
  TemplateError,
  TemplateRuntimeError,
  TemplateSyntaxError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ActivationSource } from '../../core/event-bus.types.js'
import { errorMessage, sha256 } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactStore } from '../cache/artifact-store.js'
import {
  cacheOptionOf,
  createArtifactStore,
  resolveCacheTarget,
  type CacheOption,
  type CacheTarget,
} from '../cache/cache-target.js'
import type { CompilePipeline, CompilerEnvironment } from '../compiler/compile-pipeline.js'
import { TemplateCompiler } from '../compiler/compiler.js'
import { CoreExtension } from '../extension/core-extension.js'
import { EscaperExtension, type EscapingStrategy } from '../extension/escaper-extension.js'
import type {
  BinaryOperator,
  Extension,
  NodeVisitor,
  TemplateFilter,
  TemplateFunction,
  TemplateTest,
  UnaryOperator,
  UndefinedFilterCallback,
  UndefinedFunctionCallback,
} from '../extension/extension.js'
import { ExtensionSet } from '../extension/extension-set.js'
import { OPTIMIZE_ALL, OptimizerExtension } from '../extension/optimizer-extension.js'
import { ArrayLoader } from '../loader/array-loader.js'
import { ChainLoader } from '../loader/chain-loader.js'
import type { Loader } from '../loader/loader.js'
import {
  Template,
  type RuntimeEnvironment,
  type TemplateCandidate,
  type TemplateCandidates,
  type TemplateConstructor,
  type TemplateContext,
} from '../runtime/template.js'
import { processUnits, type UnitRegistry } from '../runtime/unit-registry.js'
import {
  currentHostProfile,
  TemplateIdentityDeriver,
  type HostProfile,
  type IdentitySources,
} from './cache-identity.js'
import { FreshnessChecker, type FreshnessSources } from './freshness.js'
import { GlobalsRegistry } from './globals.js'

const logger = createLogger('environment')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface EnvironmentOptions {
  /** Development mode; also the default for `autoReload` */
  debug?: boolean
  /** Recompile when the source or the extensions changed after the artifact was written */
  autoReload?: boolean
  /** Undefined variables and attributes raise instead of rendering as empty */
  strictVariables?: boolean
  charset?: string
  /** Class instantiated for every loaded template */
  baseTemplate?: TemplateConstructor
  /** `false` (default), a cache directory, or a custom artifact store */
  cache?: CacheOption
  /** OPTIMIZE_ALL (-1, default) or OPTIMIZE_NONE (0) */
  optimizations?: number
  /** Default escaping strategy for `{{ }}` output; false disables autoescaping */
  autoescape?: EscapingStrategy | false
  /** Registry units are activated into; defaults to the process-wide one */
  units?: UnitRegistry
  /** Overrides parts of the detected host profile */
  hostProfile?: Partial<HostProfile>
  /** Receives pipeline events */
  eventBus?: TypedEventBus
}

/** Prefix of the names given to templates created from a source string */
export const STRING_TEMPLATE_PREFIX = '__string_template__'

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export class Environment
  implements RuntimeEnvironment, CompilerEnvironment, IdentitySources, FreshnessSources
{
  private _loader: Loader
  private _debug: boolean
  private _autoReload: boolean
  private _strictVariables: boolean
  private _charset = 'UTF-8'
  private _baseTemplate: TemplateConstructor
  private _cacheTarget: CacheTarget = { kind: 'disabled' }
  private _store: ArtifactStore = createArtifactStore(this._cacheTarget)
  private _compiler: CompilePipeline | null = null

  private readonly _extensionSet = new ExtensionSet()
  private readonly _globals: GlobalsRegistry
  private readonly _identity: TemplateIdentityDeriver
  private readonly _freshness: FreshnessChecker
  private readonly _units: UnitRegistry
  private readonly _hostProfile: HostProfile
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _loadedTemplates = new Map<string, Template>()

  constructor(loader: Loader, options: EnvironmentOptions = {}) {
    this._loader = loader
    this._debug = options.debug ?? false
    this._autoReload = options.autoReload ?? this._debug
    this._strictVariables = options.strictVariables ?? false
    this.setCharset(options.charset ?? 'UTF-8')
    this._baseTemplate = options.baseTemplate ?? Template
    this.setCache(options.cache ?? false)
    this._units = options.units ?? processUnits
    this._hostProfile = { ...currentHostProfile(), ...options.hostProfile }
    this._eventBus = options.eventBus

    this._globals = new GlobalsRegistry(this._extensionSet)
    this._identity = new TemplateIdentityDeriver(this)
    this._freshness = new FreshnessChecker(this)

    this._extensionSet.setExtensions([
      new CoreExtension(),
      new EscaperExtension(options.autoescape ?? 'html'),
      new OptimizerExtension(options.optimizations ?? OPTIMIZE_ALL),
    ])
  }

  // -------------------------------------------------------------------------
  // Flags
  // -------------------------------------------------------------------------

  isDebug(): boolean {
    return this._debug
  }

  enableDebug(): void {
    this._debug = true
  }

  disableDebug(): void {
    this._debug = false
  }

  isAutoReload(): boolean {
    return this._autoReload
  }

  enableAutoReload(): void {
    this._autoReload = true
  }

  disableAutoReload(): void {
    this._autoReload = false
  }

  isStrictVariables(): boolean {
    return this._strictVariables
  }

  enableStrictVariables(): void {
    this._strictVariables = true
  }

  disableStrictVariables(): void {
    this._strictVariables = false
  }

  getCharset(): string {
    return this._charset
  }

  setCharset(charset: string): void {
    const upper = charset.toUpperCase()
    this._charset = upper === 'UTF8' ? 'UTF-8' : upper
  }

  getBaseTemplate(): TemplateConstructor {
    return this._baseTemplate
  }

  setBaseTemplate(baseTemplate: TemplateConstructor): void {
    this._baseTemplate = baseTemplate
  }

  getHostProfile(): HostProfile {
    return this._hostProfile
  }

  // -------------------------------------------------------------------------
  // Cache
  // -------------------------------------------------------------------------

  /**
   * @param original - return the option as it was given (false, a path or a
   *   store) rather than the store in use
   */
  getCache(original = true): CacheOption {
    return original ? cacheOptionOf(this._cacheTarget) : this._store
  }

  /** The store artifacts are read from and written to */
  getArtifactStore(): ArtifactStore {
    return this._store
  }

  getCacheTarget(): CacheTarget {
    return this._cacheTarget
  }

  /**
   * @throws {LogicError} when `cache` is not false, a path or an artifact store
   */
  setCache(cache: unknown): void {
    this._cacheTarget = resolveCacheTarget(cache)
    this._store = createArtifactStore(this._cacheTarget)
  }

  // -------------------------------------------------------------------------
  // Loader and compiler
  // -------------------------------------------------------------------------

  getLoader(): Loader {
    return this._loader
  }

  setLoader(loader: Loader): void {
    this._loader = loader
  }

  getCompiler(): CompilePipeline {
    if (this._compiler === null) {
      this._compiler = new TemplateCompiler(this)
    }
    return this._compiler
  }

  setCompiler(compiler: CompilePipeline): void {
    this._compiler = compiler
  }

  // -------------------------------------------------------------------------
  // Identity and freshness
  // -------------------------------------------------------------------------

  /**
   * @throws {LoaderError} when the loader does not know `name`
   */
  getTemplateIdentity(name: string, index?: number): string {
    return this._identity.deriveIdentity(name, index)
  }

  isTemplateFresh(name: string, time: number): boolean {
    return this._freshness.isFresh(name, time)
  }

  // -------------------------------------------------------------------------
  // Loading
  // -------------------------------------------------------------------------

  /** Load by name; a loaded template is returned as is */
  load(name: string | Template): Template {
    return name instanceof Template ? name : this.loadTemplate(name)
  }

  /**
   * @param index - distinguishes sub-templates compiled from one source
   * @throws {LoaderError} when the template cannot be found
   * @throws {TemplateSyntaxError} when it cannot be compiled
   */
  loadTemplate(name: string, index?: number): Template {
    const identity = this.getTemplateIdentity(name, index)

    const loaded = this._loadedTemplates.get(identity)
    if (loaded !== undefined) {
      return loaded
    }

    if (!this._units.has(identity)) {
      const key = this._store.generateKey(name, identity)

      if (!this._autoReload || this.isTemplateFresh(name, this._store.getTimestamp(key))) {
        try {
          this._store.activate(key, (content) => {
            this.activate(name, identity, content, 'artifact')
          })
        } catch (err: unknown) {
          if (!(err instanceof TemplateRuntimeError)) {
            throw err
          }
          // Unusable artifact: compile again and overwrite it.
          logger.warn({ name, identity, key, err }, 'Ignoring invalid cached artifact')
        }
      }

      if (!this._units.has(identity)) {
        const source = this._loader.getSource(name)
        const start = performance.now()
        const content = this.compileSource(source, name)
        const durationMs = Math.round(performance.now() - start)
        logger.debug({ name, identity, durationMs }, 'Template compiled')
        this._eventBus?.emit('template:compiled', { name, identity, durationMs })

        this._store.write(key, content)
        if (this._cacheTarget.kind !== 'disabled') {
          this._eventBus?.emit('artifact:written', { name, identity, key })
        }
        this.activate(name, identity, content, 'compiled')
      }
    }

    this._extensionSet.initRuntime(this)

    const unit = this._units.get(identity)
    if (unit === undefined) {
      throw new LogicError(`Template unit "${identity}" was not activated.`, { name, identity })
    }

    const template = new this._baseTemplate(this, unit)
    this._loadedTemplates.set(identity, template)
    this._eventBus?.emit('template:loaded', { name, identity })
    return template
  }

  /**
   * Compile a template from a source string. The template gets a random name
   * and is loaded through a temporary loader; the environment's loader is
   * restored whatever happens.
   *
   * @param name - readable prefix for the generated name
   */
  createTemplate(source: string, name?: string): Template {
    const hash = sha256(randomUUID())
    const templateName =
      name !== undefined ? `${name} (string template ${hash})` : STRING_TEMPLATE_PREFIX + hash

    const previous = this._loader
    this._loader = new ChainLoader([new ArrayLoader({ [templateName]: source }), previous])
    try {
      return this.loadTemplate(templateName)
    } finally {
      this._loader = previous
    }
  }

  /**
   * Return the first candidate that is already loaded or loads successfully.
   *
   * @throws {LoaderError} the original error when a single name was tried;
   *   one error listing every name when several were tried
   */
  resolveTemplate(candidates: TemplateCandidates): Template {
    const list: readonly TemplateCandidate[] =
      typeof candidates === 'string' || candidates instanceof Template ? [candidates] : candidates

    if (list.length === 0) {
      throw new LoaderError('No template candidates were given.')
    }

    const failures: Array<{ name: string; error: LoaderError }> = []
    for (const candidate of list) {
      if (candidate instanceof Template) {
        return candidate
      }
      try {
        return this.loadTemplate(candidate)
      } catch (err: unknown) {
        if (!(err instanceof LoaderError)) {
          throw err
        }
        failures.push({ name: candidate, error: err })
      }
    }

    const [first] = failures
    if (failures.length === 1 && first !== undefined) {
      throw first.error
    }
    throw new LoaderError(
      `Unable to find one of the following templates: "${failures.map((f) => f.name).join('", "')}".`,
      { context: { candidates: failures.map((f) => f.name) } }
    )
  }

  /**
   * @throws {TemplateSyntaxError} for any compilation failure; template errors
   *   pass through with the template name filled in
   */
  compileSource(source: string, name: string): string {
    try {
      return this.getCompiler().compile(source, name)
    } catch (err: unknown) {
      if (err instanceof TemplateError) {
        if (err.templateName === undefined) {
          err.setTemplateName(name)
        }
        throw err
      }
      throw new TemplateSyntaxError(
        `An exception has been thrown during the compilation of a template ("${errorMessage(err)}").`,
        { templateName: name, cause: err }
      )
    }
  }

  // -------------------------------------------------------------------------
  // Rendering
  // -------------------------------------------------------------------------

  render(name: string | Template, context: TemplateContext = {}): string {
    return this.load(name).render(context)
  }

  display(
    name: string | Template,
    context: TemplateContext = {},
    stream: NodeJS.WritableStream = process.stdout
  ): void {
    this.load(name).display(context, stream)
  }

  // -------------------------------------------------------------------------
  // Globals
  // -------------------------------------------------------------------------

  /**
   * @throws {LogicError} for a new name once extensions are initialized
   */
  addGlobal(name: string, value: unknown): void {
    this._globals.add(name, value)
  }

  getGlobals(): Readonly<Record<string, unknown>> {
    return this._globals.getAll()
  }

  mergeGlobals(context: TemplateContext): TemplateContext {
    return this._globals.merge(context)
  }

  // -------------------------------------------------------------------------
  // Extensions
  // -------------------------------------------------------------------------

  addExtension(extension: Extension): void {
    this._extensionSet.addExtension(extension)
  }

  setExtensions(extensions: Extension[]): void {
    this._extensionSet.setExtensions(extensions)
  }

  hasExtension(name: string): boolean {
    return this._extensionSet.hasExtension(name)
  }

  getExtension(name: string): Extension {
    return this._extensionSet.getExtension(name)
  }

  getExtensions(): Extension[] {
    return this._extensionSet.getExtensions()
  }

  getExtensionSignature(): string {
    return this._extensionSet.getSignature()
  }

  getExtensionLastModified(): number {
    return this._extensionSet.getLastModified()
  }

  addFilter(filter: TemplateFilter): void {
    this._extensionSet.addFilter(filter)
  }

  getFilter(name: string): TemplateFilter | undefined {
    return this._extensionSet.getFilter(name)
  }

  getFilters(): TemplateFilter[] {
    return this._extensionSet.getFilters()
  }

  /** Resolves filters no extension defines, at compile time and at render time */
  registerUndefinedFilterCallback(callback: UndefinedFilterCallback): void {
    this._extensionSet.registerUndefinedFilterCallback(callback)
  }

  addFunction(fn: TemplateFunction): void {
    this._extensionSet.addFunction(fn)
  }

  getFunction(name: string): TemplateFunction | undefined {
    return this._extensionSet.getFunction(name)
  }

  getFunctions(): TemplateFunction[] {
    return this._extensionSet.getFunctions()
  }

  registerUndefinedFunctionCallback(callback: UndefinedFunctionCallback): void {
    this._extensionSet.registerUndefinedFunctionCallback(callback)
  }

  addTest(test: TemplateTest): void {
    this._extensionSet.addTest(test)
  }

  getTest(name: string): TemplateTest | undefined {
    return this._extensionSet.getTest(name)
  }

  getTests(): TemplateTest[] {
    return this._extensionSet.getTests()
  }

  addNodeVisitor(visitor: NodeVisitor): void {
    this._extensionSet.addNodeVisitor(visitor)
  }

  getNodeVisitors(): NodeVisitor[] {
    return this._extensionSet.getNodeVisitors()
  }

  getUnaryOperators(): ReadonlyMap<string, UnaryOperator> {
    return this._extensionSet.getUnaryOperators()
  }

  getBinaryOperators(): ReadonlyMap<string, BinaryOperator> {
    return this._extensionSet.getBinaryOperators()
  }

  getAutoescapeStrategy(): EscapingStrategy | false {
    if (!this._extensionSet.hasExtension('escaper')) {
      return false
    }
    const escaper = this._extensionSet.getExtension('escaper')
    return escaper instanceof EscaperExtension ? escaper.getDefaultStrategy() : false
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private activate(name: string, identity: string, content: string, source: ActivationSource): void {
    if (this._units.has(identity)) {
      return
    }
    this._units.define(identity, content)
    logger.debug({ name, identity, source }, 'Template activated')
    this._eventBus?.emit('template:activated', { name, identity, source })
  }
}
