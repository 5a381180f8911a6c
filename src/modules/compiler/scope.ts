/**
 * Identifiers that generated template code relies on being in scope.
 */

/** The TemplateRuntime passed to a unit's display function */
export const RUNTIME_VAR = 'rt'

/** The output buffer (string[]) passed to a unit's display function */
export const OUTPUT_VAR = 'out'

/** The root render context */
export const CONTEXT_VAR = 'context'
