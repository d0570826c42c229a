export {
  GoogleApiError,
  GoogleTransientError,
  GoogleNotFoundError,
  GoogleAuthError,
  classifyGoogleFailure,
} from './google-error.js';
