import {
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  OnModuleInit,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { Repository } from 'typeorm';
import { AppConfig } from '../../config/env.validation';
import { User } from '../../entities/user.entity';
import { AuthUser, Role } from '../../utils/types';
import { CreateUserDto, LoginDto } from './dto/auth.dto';
import { JwtPayload } from './strategies/jwt.strategy';

export const PASSWORD_HASH_ROUNDS = 12;

export interface LoginResponse {
  access_token: string;
  token_type: 'bearer';
  username: string;
  role: Role;
  message: string;
}

@Injectable()
export class AuthService implements OnModuleInit {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async onModuleInit() {
    const username = this.configService.get('SEED_ADMIN_USERNAME', { infer: true });
    const password = this.configService.get('SEED_ADMIN_PASSWORD', { infer: true });
    if (!username || !password) return;

    if ((await this.userRepository.count()) > 0) return;
    await this.userRepository.save({
      username,
      passwordHash: await bcrypt.hash(password, PASSWORD_HASH_ROUNDS),
      role: Role.C_LEVEL,
    });
    this.logger.log(`Seeded C-Level user ${username}`);
  }

  async validateUser(username: string, password: string): Promise<User | null> {
    const user = await this.userRepository.findOne({ where: { username, isActive: true } });
    if (user && await bcrypt.compare(password, user.passwordHash)) {
      return user;
    }
    return null;
  }

  async login(loginDto: LoginDto): Promise<LoginResponse> {
    const user = await this.validateUser(loginDto.username, loginDto.password);
    if (!user) {
      this.logger.warn(`Failed login for ${loginDto.username}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    await this.userRepository.update(user.id, { lastLoginAt: new Date() });

    const payload: JwtPayload = { sub: user.id, username: user.username, role: user.role };
    this.logger.log(`User ${user.username} logged in with role ${user.role}`);
    return {
      access_token: await this.jwtService.signAsync(payload),
      token_type: 'bearer',
      username: user.username,
      role: user.role,
      message: 'Login successful',
    };
  }

  async addUser(actor: AuthUser, dto: CreateUserDto): Promise<{ message: string }> {
    if (actor.role !== Role.C_LEVEL) {
      throw new ForbiddenException('Only C-Level users can add new users');
    }

    const existingUser = await this.userRepository.findOne({ where: { username: dto.username } });
    if (existingUser) {
      throw new ConflictException('Username already exists');
    }

    await this.userRepository.save({
      username: dto.username,
      passwordHash: await bcrypt.hash(dto.password, PASSWORD_HASH_ROUNDS),
      role: dto.role,
    });
    this.logger.log(`User ${dto.username} added with role ${dto.role} by ${actor.username}`);
    return { message: `User ${dto.username} added successfully with role ${dto.role}` };
  }
}
