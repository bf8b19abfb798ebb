/**
 * config module: layered, validated engine configuration
 *
 * Public API re-exports for the config module.
 */

export * from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { ConfigSystemImpl, createConfigSystem, buildConfig } from './config-system-impl.js'
