import { IUser, User } from '../../src/users/domain/user.entity';
import { IUserRepository, UserUpdate } from '../../src/users/domain/user.repository';

export class InMemoryUserRepository implements IUserRepository {
  readonly users: User[] = [];
  private nextId = 1;

  seed(partial: Partial<IUser>): User {
    const user = new User({ ...partial, id: partial.id ?? `user-${this.nextId++}` });
    this.users.push(user);
    return new User({ ...user });
  }

  async findById(id: string): Promise<User | null> {
    const found = this.users.find((user) => user.id === id);
    return found ? new User({ ...found }) : null;
  }

  async findByIds(ids: string[]): Promise<User[]> {
    return this.users.filter((user) => user.id && ids.includes(user.id)).map((u) => new User({ ...u }));
  }

  async findByPhoneNumber(phoneNumber: string): Promise<User | null> {
    const found = this.users.find((user) => user.phoneNumber === phoneNumber);
    return found ? new User({ ...found }) : null;
  }

  async create(user: User): Promise<User> {
    return this.seed({ ...user });
  }

  async update(id: string, data: UserUpdate): Promise<User | null> {
    const found = this.users.find((user) => user.id === id);
    if (!found) return null;
    Object.assign(found, data);
    return new User({ ...found });
  }
}
