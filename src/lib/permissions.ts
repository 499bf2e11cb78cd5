import type { Role } from '@/lib/db/types'

export type Permission =
  | 'view_dashboard'
  | 'view_stock'
  | 'edit_stock'
  | 'bulk_import'
  | 'view_sales'
  | 'record_sales'
  | 'view_customers'
  | 'edit_customers'
  | 'view_costs'
  | 'delete_data'
  | 'manage_users'

const ALL: Permission[] = [
  'view_dashboard',
  'view_stock',
  'edit_stock',
  'bulk_import',
  'view_sales',
  'record_sales',
  'view_customers',
  'edit_customers',
  'view_costs',
  'delete_data',
  'manage_users'
]

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  admin: ALL,
  seller: ['view_dashboard', 'view_stock', 'view_sales', 'record_sales', 'view_customers', 'edit_customers'],
  viewer: ['view_dashboard', 'view_stock', 'view_sales', 'view_customers'],
  stocker: ['view_stock', 'edit_stock', 'bulk_import']
}

export const ROLE_LABELS: Record<Role, string> = {
  admin: 'Administrator',
  seller: 'Seller',
  viewer: 'Viewer',
  stocker: 'Stocker'
}

export const ROLE_DESCRIPTIONS: Record<Role, string> = {
  admin: 'Full access, including costs and team management.',
  seller: 'Records sales and manages customers. Cannot see costs.',
  viewer: 'Read-only access to the dashboard, stock and sales.',
  stocker: 'Manages stock, purchases and imports. Cannot see sales.'
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission)
}

export function hasAnyPermission(role: Role, permissions: readonly Permission[]): boolean {
  return permissions.some((p) => hasPermission(role, p))
}

/** Purchase prices and margins are shown to roles that buy stock or manage costs. */
export function canSeeCosts(role: Role): boolean {
  return hasAnyPermission(role, ['edit_stock', 'view_costs'])
}
