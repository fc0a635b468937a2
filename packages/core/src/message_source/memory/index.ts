export { MemoryMessageSource } from './memory_message_source';
export { MessageExportError, loadMessageExportFile, readMessageExport } from './message_export';
export type { ExportedMessage, MessageExport } from './message_export';
