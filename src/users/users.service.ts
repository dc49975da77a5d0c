import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcrypt';
import { Repository } from 'typeorm';
import { UserRoleType } from '../common/enums/user-role.enum';
import { ConflictError, NotFoundError } from '../common/exceptions/domain.exceptions';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { isUniqueViolation } from '../common/utils/db-errors.util';
import { handleUnknown } from '../common/utils/handle-unknown.util';
import { appConfig, AppConfig } from '../config/configuration';
import { UpdateProfileDto } from './dto/user.dto';
import { User } from './entity/user.entity';

export interface UserDetails {
  id: number;
  name: string;
  email: string;
  role: UserRoleType;
  phone: string | null;
  department: string;
  age: number | null;
  is_active: boolean;
  created_at: string;
}

export interface NewUser {
  name: string;
  email: string;
  password: string;
  role: UserRoleType;
  phone?: string | null;
  department?: string;
  age?: number | null;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepo: Repository<User>,
    @Inject(appConfig.KEY)
    private readonly config: AppConfig,
  ) {}

  toUserDetails(user: User): UserDetails {
    return {
      id: user.id,
      name: user.name,
      email: user.email,
      role: user.role,
      phone: user.phone,
      department: user.department,
      age: user.age,
      is_active: user.is_active,
      created_at: new Date(user.created_at).toISOString(),
    };
  }

  async create(input: NewUser): Promise<User> {
    const email = input.email.trim().toLowerCase();
    const existing = await this.userRepo.findOne({ where: { email } });
    if (existing) {
      throw new ConflictError('A user with this email already exists');
    }

    try {
      const password = await bcrypt.hash(input.password, this.config.bcryptRounds);
      const saved = await this.userRepo.save(
        this.userRepo.create({
          name: input.name,
          email,
          password,
          role: input.role,
          phone: input.phone ?? null,
          department: input.department ?? '',
          age: input.age ?? null,
        }),
      );
      this.logger.log(`User ${saved.email} registered as ${saved.role}`);
      return saved;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('A user with this email already exists');
      }
      handleUnknown(err, 'Failed to create user.');
    }
  }

  findByEmail(email: string): Promise<User | null> {
    return this.userRepo.findOne({ where: { email: email.trim().toLowerCase() } });
  }

  /** The caller behind a token, or null when the account is gone or disabled. */
  async findActor(id: number): Promise<Actor | null> {
    const user = await this.userRepo.findOne({ where: { id, is_active: true } });
    if (!user) return null;
    return { id: user.id, name: user.name, email: user.email, role: user.role };
  }

  async me(userId: number): Promise<ApiResponse<UserDetails>> {
    const user = await this.findById(userId);
    return {
      success: true,
      message: 'Profile fetched successfully.',
      data: this.toUserDetails(user),
    };
  }

  async updateProfile(
    userId: number,
    dto: UpdateProfileDto,
  ): Promise<ApiResponse<UserDetails>> {
    const user = await this.findById(userId);
    if (dto.name !== undefined) user.name = dto.name;
    if (dto.phone !== undefined) user.phone = dto.phone;
    if (dto.department !== undefined) user.department = dto.department;

    const saved = await this.userRepo.save(user);
    return {
      success: true,
      message: 'Profile updated successfully.',
      data: this.toUserDetails(saved),
    };
  }

  async listFaculty(): Promise<ApiResponse<UserDetails[]>> {
    const faculty = await this.userRepo.find({
      where: { role: UserRoleType.FACULTY, is_active: true },
      order: { name: 'ASC' },
    });
    return {
      success: true,
      message: 'Faculty fetched successfully.',
      data: faculty.map((user) => this.toUserDetails(user)),
    };
  }

  private async findById(id: number): Promise<User> {
    const user = await this.userRepo.findOne({ where: { id } });
    if (!user) {
      throw new NotFoundError(`User with ID ${id} not found.`);
    }
    return user;
  }
}
