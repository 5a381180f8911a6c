/**
 * loader module — barrel exports
 */

export type { Loader } from './loader.js'
export { ArrayLoader } from './array-loader.js'
export { ChainLoader } from './chain-loader.js'
export { FilesystemLoader, MAIN_NAMESPACE } from './filesystem-loader.js'
