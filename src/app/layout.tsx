import type { Metadata } from 'next';
import '@/styles/globals.css';
import { Providers } from '@/components/Providers';

export const metadata: Metadata = {
  title: 'Assamese Translator',
  description: 'Translate English text into Assamese, with a personal history when signed in.',
};

interface RootLayoutProps {
  children: React.ReactNode;
}

export default function RootLayout({ children }: RootLayoutProps) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="bg-paper-100 font-sans text-ink-900">
        <Providers>{children}</Providers>
      </body>
    </html>
  );
}
