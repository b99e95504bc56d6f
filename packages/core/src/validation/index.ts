export {
  COLLECTION_NAME_PATTERN,
  assertCollectionName,
  assertEntityId,
  assertPayloadBody,
  isPlainObject,
  validateCollectionName,
  validateEntityId,
  validatePayloadBody,
  type InputValidationResult,
} from './input-validation.js';
