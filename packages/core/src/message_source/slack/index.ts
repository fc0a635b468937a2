export { SlackMessageSource, toRawMessage } from './slack_message_source';
export { SlackApiError } from './slack_message_source.types';
export type {
  SlackApiErrorCode,
  SlackConversationPage,
  SlackMessage,
  SlackMessageSourceOptions,
} from './slack_message_source.types';
