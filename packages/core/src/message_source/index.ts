export type { MessageSource } from './message_source';
