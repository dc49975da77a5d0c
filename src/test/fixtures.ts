import { DataSource } from 'typeorm';
import { Category } from '../categories/entity/category.entity';
import { Subcategory } from '../categories/entity/subcategory.entity';
import { UserRoleType } from '../common/enums/user-role.enum';
import { Actor } from '../common/interfaces/jwt-user.interface';
import { User } from '../users/entity/user.entity';

export async function createActor(
  dataSource: DataSource,
  role: UserRoleType,
  name: string,
  isActive = true,
): Promise<Actor> {
  const user = await dataSource.getRepository(User).save({
    name,
    email: `${name.toLowerCase().replace(/\s+/g, '.')}@example.org`,
    password: 'not-a-real-hash',
    role,
    is_active: isActive,
  });
  return { id: user.id, name: user.name, email: user.email, role: user.role };
}

export async function createCategory(
  dataSource: DataSource,
  name: string,
  subcategoryNames: string[] = [],
): Promise<{ category: Category; subcategories: Subcategory[] }> {
  const category = await dataSource
    .getRepository(Category)
    .save({ name, description: `${name} issues` });
  const subcategories: Subcategory[] = [];
  for (const subName of subcategoryNames) {
    subcategories.push(
      await dataSource
        .getRepository(Subcategory)
        .save({ name: subName, category_id: category.id }),
    );
  }
  return { category, subcategories };
}
