export { seedDemoData } from './demo.js'
export type { SeedOptions, SeedReport } from './demo.js'
