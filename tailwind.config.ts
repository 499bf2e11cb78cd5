import type { Config } from 'tailwindcss'

const config: Config = {
  darkMode: 'class',
  content: ['./src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        primary: 'hsl(var(--brand))',
        'muted-foreground': 'hsl(var(--muted-foreground))'
      }
    }
  },
  plugins: []
}

export default config
