export { MemoryPageSink } from './memory_page_sink';
export type { MemoryPage } from './memory_page_sink';
