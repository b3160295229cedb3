export * from './pool/index.js';

export { MetaTxAuthorizer, signSwapAuthorization, swapAuthorizationDigest } from './security/meta-tx.js';
export type { SignedSwapRequest, SwapAuthorization } from './security/meta-tx.js';
export { NonceRegistry } from './security/nonce-registry.js';
export { generateKeyPair, publicKeyFromPrivate, recoverPublicKey, signDigest, verifyDigest } from './security/ecdsa-utils.js';

export { LedgerToken } from './token/LedgerToken.js';
export type { LedgerTokenState } from './token/LedgerToken.js';
export type { TokenMetadata, TransferableAsset, TransferResult } from './token/Token.js';

export { MemoryStore } from './storage/KeyValueStore.js';
export type { KeyValueStore } from './storage/KeyValueStore.js';
export { Storage } from './storage/Storage.js';
export type { PersistedState } from './storage/Storage.js';

export { config } from './config.js';
export { logger, Logger } from './utils/logger.js';
