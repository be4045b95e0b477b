export { NdError } from './base.js';
export { CredentialError } from './credential.js';
export {
  AuthenticationError,
  NetworkError,
  ResponseFormatError,
  ServerError,
  TransportError,
} from './http.js';
export { ValidationError } from './validation.js';
