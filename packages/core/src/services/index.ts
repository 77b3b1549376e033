export { createServices } from './container.js'
export type { Services, ServiceOptions } from './container.js'
