export {
  CONTENT_CATEGORIES,
  CREDENTIAL_PREFERENCE_PREFIX,
  INTENSITY_RANGE,
  isContentCategory,
  isCredentialPreferenceKey,
  type ContentCategory,
  type ContentRecord,
  type PreferenceMap,
  type PreferenceValue,
} from './content.js';

export {
  captureLocalState,
  restoreLocalState,
  type KeyValueStorage,
  type LocalStateCapture,
  type LocalStore,
} from './store.js';
