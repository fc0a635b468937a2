/**
 * In-memory implementations (no network required)
 *
 * Suitable for tests and offline runs over exported channel history.
 */

// MessageSource
export { MemoryMessageSource, MessageExportError, loadMessageExportFile, readMessageExport } from './message_source/memory';
export type { ExportedMessage, MessageExport } from './message_source/memory';

// PageSink
export { MemoryPageSink } from './page_sink/memory';
export type { MemoryPage } from './page_sink/memory';
