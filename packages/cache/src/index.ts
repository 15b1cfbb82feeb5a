// Signature-keyed disk cache for remote calls

export { CacheStore } from './store';
export type { CacheStats, Decoder } from './store';

export { signatureFor, signatureText } from './signature';
export type { CallSignature, NamedParams, SignatureValue } from './signature';

export { writeFileAtomic, isNotFoundError } from './atomic';
