import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import {
  ConflictError,
  FieldErrors,
  NotFoundError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { ApiResponse } from '../common/interfaces/api-response.interface';
import { isUniqueViolation } from '../common/utils/db-errors.util';
import { handleUnknown } from '../common/utils/handle-unknown.util';
import { CreateCategoryDto, CreateSubcategoryDto } from './dto/category.dto';
import { Category } from './entity/category.entity';
import { Subcategory } from './entity/subcategory.entity';

export interface Classification {
  category: Category;
  subcategory: Subcategory | null;
}

@Injectable()
export class CategoriesService {
  private readonly logger = new Logger(CategoriesService.name);

  constructor(
    @InjectRepository(Category)
    private readonly categoryRepo: Repository<Category>,
    @InjectRepository(Subcategory)
    private readonly subcategoryRepo: Repository<Subcategory>,
  ) {}

  async findAll(): Promise<ApiResponse<Category[]>> {
    const categories = await this.categoryRepo.find({
      relations: ['subcategories'],
      order: { name: 'ASC', subcategories: { name: 'ASC' } },
    });
    return {
      success: true,
      message: 'Categories fetched successfully.',
      data: categories,
    };
  }

  async findOne(id: number): Promise<ApiResponse<Category>> {
    const category = await this.categoryRepo.findOne({
      where: { id },
      relations: ['subcategories'],
    });
    if (!category) {
      throw new NotFoundError(`Category with ID ${id} not found.`);
    }
    return {
      success: true,
      message: `Category with ID ${id} fetched successfully.`,
      data: category,
    };
  }

  async create(dto: CreateCategoryDto): Promise<ApiResponse<Category>> {
    try {
      const saved = await this.categoryRepo.save(
        this.categoryRepo.create({
          name: dto.name,
          description: dto.description ?? '',
        }),
      );
      this.logger.log(`Category "${saved.name}" created`);
      return {
        success: true,
        message: 'Category created successfully.',
        data: saved,
      };
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Category "${dto.name}" already exists.`);
      }
      handleUnknown(err, 'Failed to create category.');
    }
  }

  async createSubcategory(
    categoryId: number,
    dto: CreateSubcategoryDto,
  ): Promise<ApiResponse<Subcategory>> {
    await this.findOne(categoryId);
    try {
      const saved = await this.subcategoryRepo.save(
        this.subcategoryRepo.create({ name: dto.name, category_id: categoryId }),
      );
      return {
        success: true,
        message: 'Subcategory created successfully.',
        data: saved,
      };
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(
          `Subcategory "${dto.name}" already exists in this category.`,
        );
      }
      handleUnknown(err, 'Failed to create subcategory.');
    }
  }

  /**
   * Checks a category/subcategory pair chosen for a complaint. Unknown ids
   * and a subcategory from another category are field errors.
   */
  async resolveClassification(
    categoryId: number,
    subcategoryId: number | null,
    manager?: EntityManager,
  ): Promise<Classification> {
    const categories = manager ? manager.getRepository(Category) : this.categoryRepo;
    const subcategories = manager
      ? manager.getRepository(Subcategory)
      : this.subcategoryRepo;

    const errors: FieldErrors = {};
    const category = await categories.findOne({ where: { id: categoryId } });
    if (!category) {
      errors.category_id = [`Category with ID ${categoryId} does not exist`];
    }

    let subcategory: Subcategory | null = null;
    if (subcategoryId !== null) {
      subcategory = await subcategories.findOne({ where: { id: subcategoryId } });
      if (!subcategory) {
        errors.subcategory_id = [`Subcategory with ID ${subcategoryId} does not exist`];
      } else if (category && subcategory.category_id !== category.id) {
        errors.subcategory_id = ['Subcategory does not belong to the selected category'];
      }
    }

    if (!category || Object.keys(errors).length > 0) {
      throw new ValidationError('Invalid complaint category', errors);
    }
    return { category, subcategory };
  }
}
