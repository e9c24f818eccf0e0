import { toUserView, type UserRepository, type UserView } from '../../domain/auth/user.js';

export class UserQueries {
  constructor(private userRepo: UserRepository) {}

  async list(): Promise<UserView[]> {
    const users = await this.userRepo.list();
    return users.map(toUserView);
  }

  /** Null when no user has this id. */
  async getById(id: string): Promise<UserView | null> {
    const user = await this.userRepo.findById(id);
    return user ? toUserView(user) : null;
  }
}
