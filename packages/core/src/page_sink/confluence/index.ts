export { ConfluencePageSink } from './confluence_page_sink';
export { ConfluenceApiError } from './confluence_page_sink.types';
export type {
  ConfluenceApiErrorCode,
  ConfluencePage,
  ConfluencePageSinkOptions,
  ConfluencePageUpdate,
} from './confluence_page_sink.types';
