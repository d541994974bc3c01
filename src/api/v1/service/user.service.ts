import bcrypt from 'bcrypt';
import { eq, or } from 'drizzle-orm';
import { db } from '../drizzle/db';
import { type NewUser, userTable, type UserTable } from '../drizzle/schema/user';
import { AppError, ConflictError, NotFoundError, UnauthorizedError } from '../utils/AppError';
import { generateToken } from '../utils/jwt';

export type PublicUser = Omit<UserTable, 'password'>;

function withoutPassword(user: UserTable): PublicUser {
  const { password: _password, ...rest } = user;
  return rest;
}

export class UserService {
  static async createUser(userData: NewUser) {
    const [existingUser] = await db.select({ id: userTable.id }).from(userTable)
      .where(or(eq(userTable.username, userData.username), eq(userTable.email, userData.email)))
      .limit(1);
    if (existingUser) {
      throw new ConflictError('Username or email already exists');
    }

    const hashedPassword = await bcrypt.hash(userData.password, 10);
    const [createdUser] = await db.insert(userTable).values({
      ...userData,
      password: hashedPassword,
    }).returning();

    if (!createdUser) {
      throw new AppError('Failed to create user', 500);
    }
    return withoutPassword(createdUser);
  }

  static async signIn(username: string, password: string) {
    const [user] = await db.select().from(userTable).where(eq(userTable.username, username)).limit(1);
    if (!user || !await bcrypt.compare(password, user.password)) {
      throw new UnauthorizedError('Invalid username or password');
    }

    const token = generateToken({
      id: user.id,
      username: user.username,
      email: user.email,
      isStaff: user.isStaff,
    });
    return { user: withoutPassword(user), token };
  }

  static async getUserById(id: string) {
    const [user] = await db.select().from(userTable).where(eq(userTable.id, id));
    if (!user) throw new NotFoundError('User not found');
    return withoutPassword(user);
  }
}
