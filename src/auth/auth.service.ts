import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { ValidationError } from '../common/exceptions/domain.exceptions';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { JwtPayload } from '../common/interfaces/jwt-user.interface';
import { RegisterUserDto } from '../users/dto/user.dto';
import { User } from '../users/entity/user.entity';
import { UserDetails, UsersService } from '../users/users.service';
import { LoginDto } from './dto/login.dto';

export interface AuthResult {
  access_token: string;
  user: UserDetails;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService,
  ) {}

  async register(dto: RegisterUserDto): Promise<ApiResponse<AuthResult>> {
    if (dto.password !== dto.password_confirm) {
      throw new ValidationError('Invalid registration', {
        password_confirm: ["Passwords don't match"],
      });
    }

    const user = await this.usersService.create({
      name: dto.name,
      email: dto.email,
      password: dto.password,
      role: dto.role,
      phone: dto.phone,
      department: dto.department,
      age: dto.age,
    });

    return {
      success: true,
      message: 'Registration successful.',
      data: await this.issueToken(user),
    };
  }

  async login(dto: LoginDto): Promise<ApiResponse<AuthResult>> {
    const user = await this.usersService.findByEmail(dto.email);
    const matches = user ? await bcrypt.compare(dto.password, user.password) : false;

    if (!user || !matches || !user.is_active) {
      this.logger.warn(`Failed login for ${dto.email}`);
      throw new UnauthorizedException({
        success: false,
        message: 'Invalid email or password',
        error: 'UNAUTHORIZED',
      });
    }

    return {
      success: true,
      message: 'Login successful.',
      data: await this.issueToken(user),
    };
  }

  private async issueToken(user: User): Promise<AuthResult> {
    const payload: JwtPayload = { sub: user.id, email: user.email, role: user.role };
    return {
      access_token: await this.jwtService.signAsync(payload),
      user: this.usersService.toUserDetails(user),
    };
  }
}
