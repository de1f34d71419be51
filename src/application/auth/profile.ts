import { CallerContext } from '../../domain/auth/caller.js';
import { PublicUser, toPublicUser } from '../../domain/auth/user.js';
import { UNAUTHENTICATED_MESSAGE, UnauthorizedError } from '../errors.js';
import { UserRepository } from '../repositories.js';

export class GetProfileUseCase {
  constructor(private userRepo: Pick<UserRepository, 'findById'>) {}

  async execute(caller: CallerContext): Promise<PublicUser> {
    const user = await this.userRepo.findById(caller.userId);
    if (!user) {
      throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
    }
    return toPublicUser(user);
  }
}
