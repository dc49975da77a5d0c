import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Category } from '../categories/entity/category.entity';
import { Subcategory } from '../categories/entity/subcategory.entity';
import { UsersModule } from '../users/users.module';
import { SeederService } from './seeder.service';

@Module({
  imports: [TypeOrmModule.forFeature([Category, Subcategory]), UsersModule],
  providers: [SeederService],
  exports: [SeederService],
})
export class SeederModule {}
