import {
  Building2,
  Layers,
  LayoutDashboard,
  Package,
  Receipt,
  ShoppingCart,
  Tags,
  Truck,
  UserCog,
  Users,
  type LucideIcon
} from 'lucide-react'

export const iconMap = {
  Building2,
  Layers,
  LayoutDashboard,
  Package,
  Receipt,
  ShoppingCart,
  Tags,
  Truck,
  UserCog,
  Users
} satisfies Record<string, LucideIcon>

export type IconName = keyof typeof iconMap
