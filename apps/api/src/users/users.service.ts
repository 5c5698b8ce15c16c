import { Injectable, UnauthorizedException } from '@nestjs/common';
import { hashPassword, verifyPassword } from '@shootline/auth';
import type { LoginRequest, UserCreate } from '@shootline/contracts';
import type { TxClient, UserRow } from '@shootline/db';
import { constraintViolation, ErrorCodes } from '../common/errors.js';
import { serializeUser } from '../common/serializers.js';

@Injectable()
export class UsersService {
  async listUsers(tx: TxClient) {
    const users = await tx.listUsers();
    return users.map((user) => serializeUser(user));
  }

  async createUser(tx: TxClient, input: UserCreate) {
    const user = await tx.insertUser({
      username: input.username,
      passwordHash: hashPassword(input.password),
      role: input.role,
      fullName: input.full_name,
      email: input.email
    });

    if (!user) {
      throw constraintViolation(`username ${input.username} is taken`, 'username');
    }

    return serializeUser(user);
  }

  async authenticate(tx: TxClient, input: LoginRequest): Promise<UserRow> {
    const user = await tx.findUserByUsername(input.username);
    if (!user || !verifyPassword(input.password, user.passwordHash)) {
      throw new UnauthorizedException({
        code: ErrorCodes.invalidCredentials,
        message: 'invalid username or password'
      });
    }
    return user;
  }
}
