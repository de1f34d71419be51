export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
  userId: string;
  tokenType: TokenType;
  issuedAt: Date;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}
