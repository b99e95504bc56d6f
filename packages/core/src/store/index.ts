export { EntitySequence, type EntitySequenceOptions } from './entity-sequence.js';
export {
  LocalStore,
  type GetOptions,
  type ListOptions,
  type LocalStoreOptions,
} from './local-store.js';
