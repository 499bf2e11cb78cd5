import type { IconName } from '@/config/icons'
import type { Role } from '@/lib/db/types'
import { hasPermission, type Permission } from '@/lib/permissions'

export type NavLink = {
  href: string
  label: string
  icon: IconName
  permission: Permission
  exact?: boolean
}

export const navLinks: NavLink[] = [
  { href: '/dashboard', label: 'Dashboard', icon: 'LayoutDashboard', permission: 'view_dashboard' },
  { href: '/stock', label: 'Stock', icon: 'Package', permission: 'view_stock' },
  { href: '/purchases', label: 'Purchases', icon: 'Truck', permission: 'edit_stock' },
  { href: '/sales', label: 'Sales', icon: 'ShoppingCart', permission: 'view_sales' },
  { href: '/customers', label: 'Customers', icon: 'Users', permission: 'view_customers' },
  { href: '/price-list', label: 'Price list', icon: 'Tags', permission: 'view_costs' },
  { href: '/fixed-costs', label: 'Fixed costs', icon: 'Receipt', permission: 'view_costs' },
  { href: '/categories', label: 'Categories', icon: 'Layers', permission: 'edit_stock' },
  { href: '/suppliers', label: 'Suppliers', icon: 'Building2', permission: 'edit_stock' },
  { href: '/users', label: 'Team', icon: 'UserCog', permission: 'manage_users' }
]

export function linksForRole(role: Role): NavLink[] {
  return navLinks.filter((link) => hasPermission(role, link.permission))
}

export function isLinkActive(link: NavLink, pathname: string): boolean {
  if (link.exact) return pathname === link.href
  return pathname === link.href || pathname.startsWith(`${link.href}/`)
}
