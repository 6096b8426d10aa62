export * from './types.js'
export { projectConfigSchema } from './schema.js'
