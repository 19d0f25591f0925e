// Root barrel – intentionally concise. Prefer importing specific modules where the barrel would pull in zod unnecessarily.

export * from './apiContracts.js'
export * from './domainModels.js'
export * from './exceptions/index.js'
export * from './languages.js'
export * from './serviceConstants.js'
export * from './telemetryAttributes.js'
export * from './telemetryEvents.js'
