import { TestingModule } from '@nestjs/testing';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { createTestingModule } from '../test/testing-module';
import { CategoriesModule } from './categories.module';
import { CategoriesService } from './categories.service';

describe('CategoriesService', () => {
  let moduleRef: TestingModule;
  let service: CategoriesService;

  beforeEach(async () => {
    moduleRef = await createTestingModule([CategoriesModule]);
    service = moduleRef.get(CategoriesService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('lists categories by name with their subcategories', async () => {
    const hostel = await service.create({ name: 'Hostel' });
    await service.create({ name: 'Academic', description: 'Courses and exams' });
    await service.createSubcategory(hostel.data.id, { name: 'Water Supply' });
    await service.createSubcategory(hostel.data.id, { name: 'Electricity' });

    const listed = (await service.findAll()).data;
    expect(listed.map((c) => c.name)).toEqual(['Academic', 'Hostel']);
    expect(listed[1].subcategories.map((s) => s.name)).toEqual([
      'Electricity',
      'Water Supply',
    ]);
  });

  it('refuses duplicate names', async () => {
    const hostel = await service.create({ name: 'Hostel' });
    await expect(service.create({ name: 'Hostel' })).rejects.toBeInstanceOf(ConflictError);

    await service.createSubcategory(hostel.data.id, { name: 'Mess' });
    await expect(
      service.createSubcategory(hostel.data.id, { name: 'Mess' }),
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it('reports unknown categories as missing', async () => {
    await expect(service.findOne(42)).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      service.createSubcategory(42, { name: 'Mess' }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('resolveClassification', () => {
    it('returns the category and its subcategory', async () => {
      const hostel = await service.create({ name: 'Hostel' });
      const mess = await service.createSubcategory(hostel.data.id, { name: 'Mess' });

      const resolved = await service.resolveClassification(hostel.data.id, mess.data.id);
      expect(resolved.category.name).toBe('Hostel');
      expect(resolved.subcategory?.name).toBe('Mess');
    });

    it('reports every problem as a field error', async () => {
      const hostel = await service.create({ name: 'Hostel' });
      const academic = await service.create({ name: 'Academic' });
      const exams = await service.createSubcategory(academic.data.id, { name: 'Exams' });

      await expect(
        service.resolveClassification(hostel.data.id, exams.data.id),
      ).rejects.toMatchObject({
        errors: { subcategory_id: ['Subcategory does not belong to the selected category'] },
      });
      await expect(service.resolveClassification(99, 98)).rejects.toMatchObject({
        errors: {
          category_id: ['Category with ID 99 does not exist'],
          subcategory_id: ['Subcategory with ID 98 does not exist'],
        },
      });
      await expect(service.resolveClassification(99, null)).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });
});
