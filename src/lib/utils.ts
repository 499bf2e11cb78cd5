import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100
}
