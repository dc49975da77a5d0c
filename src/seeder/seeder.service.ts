import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Category } from '../categories/entity/category.entity';
import { Subcategory } from '../categories/entity/subcategory.entity';
import { UserRoleType } from '../common/enums/user-role.enum';
import { seedConfig, SeedConfig } from '../config/configuration';
import { UsersService } from '../users/users.service';
import defaultCategories from './data/default-categories.json';

export interface CategorySeed {
  name: string;
  description: string;
  subcategories: string[];
}

@Injectable()
export class SeederService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SeederService.name);

  constructor(
    @Inject(seedConfig.KEY)
    private readonly config: SeedConfig,
    private readonly usersService: UsersService,
    @InjectRepository(Category)
    private readonly categoryRepo: Repository<Category>,
    @InjectRepository(Subcategory)
    private readonly subcategoryRepo: Repository<Subcategory>,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.onBoot) return;
    await this.seed();
  }

  async seed(categories: CategorySeed[] = defaultCategories): Promise<void> {
    await this.seedAdmin();
    for (const category of categories) {
      await this.seedCategory(category);
    }
  }

  private async seedAdmin(): Promise<void> {
    const existing = await this.usersService.findByEmail(this.config.adminEmail);
    if (existing) {
      this.logger.log(`${this.config.adminEmail} already exists, skipping...`);
      return;
    }
    await this.usersService.create({
      name: this.config.adminName,
      email: this.config.adminEmail,
      password: this.config.adminPassword,
      role: UserRoleType.ADMIN,
    });
    this.logger.log(`Admin ${this.config.adminEmail} created`);
  }

  private async seedCategory(seed: CategorySeed): Promise<void> {
    let category = await this.categoryRepo.findOne({ where: { name: seed.name } });
    if (!category) {
      category = await this.categoryRepo.save(
        this.categoryRepo.create({ name: seed.name, description: seed.description }),
      );
      this.logger.log(`Category ${seed.name} created`);
    }

    for (const name of seed.subcategories) {
      const exists = await this.subcategoryRepo.exists({
        where: { category_id: category.id, name },
      });
      if (!exists) {
        await this.subcategoryRepo.save(
          this.subcategoryRepo.create({ name, category_id: category.id }),
        );
      }
    }
  }
}
