export {
  ConflictResolver,
  remoteToEntity,
  type CompareBy,
  type ConflictPolicy,
  type ConflictStrategy,
  type FieldMergeFunction,
} from './conflict-resolver.js';
