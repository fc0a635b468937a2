export type { PageSink, PublishOptions, PublishResult } from './page_sink';
