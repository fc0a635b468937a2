export { ReleaseRecordBuilder } from './record_builder';
