export { CleanerBuilder } from './cleaner-builder'
