import { generateCategoryCode } from '@/lib/codes/category-code'
import type { ResaleStore } from '@/lib/db/store'
import type { Category } from '@/lib/db/types'
import { ValidationError, isForeignKeyViolation } from '@/lib/errors'
import { nullable, requireText } from '@/lib/validation'

export type CategoryInput = Partial<Record<'name' | 'description', unknown>>

export const DEFAULT_CATEGORIES = ['Electronics', 'Clothing', 'Home', 'Other']

export async function createCategory(store: ResaleStore, input: CategoryInput): Promise<Category> {
  const name = requireText(input.name, 'Category name')
  const categories = await store.listCategories()
  if (categories.some((c) => c.name.toLowerCase() === name.toLowerCase())) {
    throw new ValidationError('Category already exists')
  }
  const code = generateCategoryCode(name, categories.map((c) => c.code))
  return store.insertCategory({ name, description: nullable(input.description), code })
}

export async function updateCategory(store: ResaleStore, id: string, input: CategoryInput) {
  const name = requireText(input.name, 'Category name')
  const categories = await store.listCategories()
  if (categories.some((c) => c.id !== id && c.name.toLowerCase() === name.toLowerCase())) {
    throw new ValidationError('Category already exists')
  }
  await store.updateCategory(id, { name, description: nullable(input.description) })
}

export async function deleteCategory(store: ResaleStore, id: string) {
  try {
    await store.deleteCategory(id)
  } catch (error) {
    if (isForeignKeyViolation(error)) throw new ValidationError('Category still has products')
    throw error
  }
}

/** Stored code of the category, generating and saving one when it has none. */
export async function ensureCategoryCode(store: ResaleStore, category: Category, categories: Category[]): Promise<string> {
  if (category.code) return category.code
  const code = generateCategoryCode(category.name, categories.map((c) => c.code))
  await store.updateCategory(category.id, { code })
  category.code = code
  return code
}

export async function seedDefaultCategories(store: ResaleStore): Promise<Category[]> {
  const created: Category[] = []
  for (const name of DEFAULT_CATEGORIES) {
    created.push(await createCategory(store, { name }))
  }
  return created
}
