import { AuthDomainError } from '../../domain/auth/errors.js';
import { TokenPair } from '../../domain/auth/tokens.js';
import { UNAUTHENTICATED_MESSAGE, UnauthorizedError } from '../errors.js';
import { CredentialIssuer } from './credentialIssuer.js';

export interface RefreshCommand {
  refreshToken: string;
}

/**
 * Exchanges a refresh token for a new pair. Token failures surface as a plain
 * 401; the specific cause is logged.
 */
export class RefreshTokenUseCase {
  constructor(private issuer: CredentialIssuer) {}

  async execute(command: RefreshCommand): Promise<TokenPair> {
    try {
      return await this.issuer.refresh(command.refreshToken);
    } catch (error) {
      if (error instanceof AuthDomainError) {
        console.warn(`Rejected refresh token: ${error.name}: ${error.message}`);
        throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
      }
      throw error;
    }
  }
}
