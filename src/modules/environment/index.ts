export { Environment, STRING_TEMPLATE_PREFIX } from './environment.js'
export type { EnvironmentOptions } from './environment.js'
export {
  TemplateIdentityDeriver,
  IDENTITY_PREFIX,
  currentHostProfile,
} from './cache-identity.js'
export type { HostProfile, IdentitySources } from './cache-identity.js'
export { FreshnessChecker } from './freshness.js'
export type { FreshnessSources } from './freshness.js'
export { GlobalsRegistry } from './globals.js'
