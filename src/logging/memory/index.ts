export { createMemorySink } from './memory-sink';
