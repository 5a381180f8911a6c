/**
 * Error definitions for Trellis
 * Provides the structured error hierarchy for loading, compiling and rendering templates
 */

/** Options shared by every template error */
export interface TemplateErrorOptions {
  /** Name of the template the error relates to, when known */
  templateName?: string
  /** 1-based line in the template source; 0 or less when unknown */
  lineno?: number
  /** Original failure, preserved for diagnostics */
  cause?: unknown
  context?: Record<string, unknown>
}

/** Base error class for all Trellis errors */
export class TemplateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>
  /** Message without the template name / line decoration */
  public readonly rawMessage: string
  private _templateName: string | undefined
  private _lineno: number

  constructor(message: string, code: string, options: TemplateErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'TemplateError'
    this.code = code
    this.context = options.context ?? {}
    this.rawMessage = message
    this._templateName = options.templateName
    this._lineno = options.lineno ?? -1
    this.updateMessage()
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  get templateName(): string | undefined {
    return this._templateName
  }

  get lineno(): number {
    return this._lineno
  }

  /** Attach the template name; the message is rebuilt to mention it */
  setTemplateName(name: string): void {
    this._templateName = name
    this.updateMessage()
  }

  setLineno(lineno: number): void {
    this._lineno = lineno
    this.updateMessage()
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      templateName: this._templateName,
      lineno: this._lineno,
      context: this.context,
      stack: this.stack,
    }
  }

  private updateMessage(): void {
    let message = this.rawMessage
    let suffix = ''
    if (message.endsWith('.')) {
      message = message.slice(0, -1)
      suffix = '.'
    } else if (message.endsWith('?')) {
      message = message.slice(0, -1)
      suffix = '?'
    }

    if (this._templateName !== undefined) {
      message += ` in "${this._templateName}"`
    }
    if (this._lineno > 0) {
      message += ` at line ${String(this._lineno)}`
    }
    this.message = message + suffix
  }
}

/** Error thrown when a template cannot be found or read */
export class LoaderError extends TemplateError {
  constructor(message: string, options: TemplateErrorOptions = {}) {
    super(message, 'LOADER_ERROR', options)
    this.name = 'LoaderError'
  }
}

/** Error thrown when tokenizing, parsing or generating code for a template fails */
export class TemplateSyntaxError extends TemplateError {
  constructor(message: string, options: TemplateErrorOptions = {}) {
    super(message, 'SYNTAX_ERROR', options)
    this.name = 'TemplateSyntaxError'
  }
}

/** Error thrown while a compiled template is activated or rendered */
export class TemplateRuntimeError extends TemplateError {
  constructor(message: string, options: TemplateErrorOptions = {}) {
    super(message, 'RUNTIME_ERROR', options)
    this.name = 'TemplateRuntimeError'
  }
}

/** Error thrown when the API or its configuration is misused */
export class LogicError extends TemplateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'LOGIC_ERROR', { context })
    this.name = 'LogicError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends TemplateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', { context })
    this.name = 'ConfigError'
  }
}
