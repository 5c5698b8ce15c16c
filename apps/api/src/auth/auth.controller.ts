import { Body, Controller, Inject, Post } from '@nestjs/common';
import { LoginRequestSchema, LoginResponseSchema } from '@shootline/contracts';
import { signJwt } from '@shootline/auth';
import { Public } from './public.decorator.js';
import { expandCapabilitiesFromRoles } from './rbac.js';
import { RequestContextService } from '../db/request-context.service.js';
import { UsersService } from '../users/users.service.js';
import { parseOrThrow } from '../common/validation.js';

@Controller('auth')
export class AuthController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(UsersService) private readonly usersService: UsersService,
    @Inject('JWT_SECRET_VALUE') private readonly jwtSecret: string,
    @Inject('JWT_TTL_SECONDS') private readonly jwtTtlSeconds: number
  ) {}

  @Post('login')
  @Public()
  async login(@Body() body: unknown) {
    const payload = parseOrThrow(LoginRequestSchema, body);
    const user = await this.requestContext.runService((tx) => this.usersService.authenticate(tx, payload));

    const token = signJwt({
      secret: this.jwtSecret,
      expiresIn: this.jwtTtlSeconds,
      claims: {
        sub: user.id,
        user_id: user.id,
        username: user.username,
        role: user.role,
        capabilities: expandCapabilitiesFromRoles([user.role])
      }
    });

    return LoginResponseSchema.parse({
      access_token: token,
      token_type: 'Bearer',
      user: {
        id: user.id,
        username: user.username,
        role: user.role
      }
    });
  }
}
