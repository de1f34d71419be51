import { CallerContext } from '../../domain/auth/caller.js';
import { AuthDomainError } from '../../domain/auth/errors.js';
import { TokenClaims } from '../../domain/auth/tokens.js';
import { UNAUTHENTICATED_MESSAGE, UnauthorizedError } from '../errors.js';
import { UserRepository } from '../repositories.js';
import { CredentialIssuer } from './credentialIssuer.js';

/**
 * Turns an access token into a caller context. Every failure looks the same
 * from outside; the cause only goes to the log.
 */
export class IdentityResolver {
  constructor(
    private issuer: CredentialIssuer,
    private users: Pick<UserRepository, 'findById'>
  ) {}

  async resolve(accessToken: string): Promise<CallerContext> {
    let claims: TokenClaims;
    try {
      claims = this.issuer.verify(accessToken, 'access');
    } catch (error) {
      if (error instanceof AuthDomainError) {
        console.warn(`Rejected access token: ${error.name}: ${error.message}`);
        throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
      }
      throw error;
    }

    // Role comes from the stored user, not from the token
    const user = await this.users.findById(claims.userId);
    if (!user) {
      console.warn(`Rejected access token: user ${claims.userId} no longer exists`);
      throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
    }

    return { userId: user.id, role: user.role };
  }
}
