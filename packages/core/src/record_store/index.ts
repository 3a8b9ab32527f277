export { RecordStore } from './record_store';
export { RecordStoreError, toStoreFailure } from './errors';
export * from './record_store.types';
