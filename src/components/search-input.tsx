'use client'

import { useEffect, useState } from 'react'
import { Search } from 'lucide-react'
import { cn } from '@/lib/utils'

interface SearchInputProps {
  onSearch: (term: string) => void
  placeholder?: string
  className?: string
}

export function SearchInput({ onSearch, placeholder = 'Search...', className }: SearchInputProps) {
  const [value, setValue] = useState('')

  useEffect(() => {
    const handle = setTimeout(() => onSearch(value), 250)
    return () => clearTimeout(handle)
  }, [value, onSearch])

  return (
    <div className={cn('relative', className)}>
      <Search className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-slate-400" />
      <input type="search" className="field pl-9" placeholder={placeholder} value={value} onChange={(e) => setValue(e.target.value)} />
    </div>
  )
}
