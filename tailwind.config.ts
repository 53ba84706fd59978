import type { Config } from 'tailwindcss';

const config: Config = {
  content: ['./src/app/**/*.{ts,tsx}', './src/components/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        paper: {
          50: '#fbfaf6',
          100: '#f4f1e8',
          200: '#e7e1d0',
        },
        ink: {
          200: '#c9d1cf',
          500: '#5f6e6b',
          600: '#47534f',
          700: '#33403c',
          900: '#17201d',
        },
        leaf: {
          50: '#eef7f1',
          200: '#bfe1cb',
          500: '#2f8a57',
          600: '#23704a',
          700: '#1b5739',
        },
        saffron: {
          300: '#f7c873',
          600: '#c27a12',
        },
      },
    },
  },
  plugins: [],
};

export default config;
