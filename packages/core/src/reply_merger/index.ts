export { ReplyMerger, TimelineEvent, formatRollout, rolloutProgressEvent } from './reply_merger';
