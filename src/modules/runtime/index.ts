export { Template } from './template.js'
export type {
  RuntimeEnvironment,
  TemplateCandidate,
  TemplateCandidates,
  TemplateConstructor,
  TemplateContext,
  TemplateUnit,
} from './template.js'
export { TemplateRuntime } from './runtime.js'
export type { LoopContext } from './runtime.js'
export { UnitRegistry, evaluateUnit, isTemplateUnit, processUnits } from './unit-registry.js'
export * from './values.js'
