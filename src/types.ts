/**
 * Decrypted view of a user's Google credentials. Only ever held for the span
 * of one request; at rest the token fields are sealed (see {@link SealedCredentialRow}).
 */
export type CredentialRecord = {
  userId: string;
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds. */
  expiresAt: number;
  scopes: string[];
  updatedAt: number;
};

export type SealedCredentialRow = {
  userId: string;
  accessTokenEnc: string;
  refreshTokenEnc: string | null;
  expiresAt: number;
  scopes: string[];
  createdAt: number;
  updatedAt: number;
};

export type FlowState = {
  userId: string;
  nonce: string;
  issuedAt: number;
  expiresAt: number;
};

export type ProviderTokenGrant = {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
  scopes?: string[];
  tokenType?: string;
};

export type ValidAccessToken = {
  accessToken: string;
  expiresAt: number;
  scopes: string[];
};
