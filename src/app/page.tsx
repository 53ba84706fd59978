import { AccountBootstrapper } from '@/components/account/AccountBootstrapper';
import { AuthPanel } from '@/components/account/AuthPanel';
import { TranslatorPanel } from '@/components/translator/TranslatorPanel';

export default function Home() {
  return (
    <main className="mx-auto flex min-h-screen max-w-3xl flex-col gap-8 px-4 py-10 sm:px-6 sm:py-12">
      <AccountBootstrapper />
      <header className="rounded-3xl bg-ink-900 px-6 py-8 text-paper-50 sm:px-8">
        <p className="text-xs font-semibold uppercase tracking-[0.4em] text-saffron-300">অসমীয়া</p>
        <h1 className="mt-3 text-3xl font-semibold sm:text-4xl">English to Assamese translator</h1>
        <p className="mt-4 text-base text-ink-200">
          Enter English text and get an Assamese translation. Sign in to keep a history of what you translate.
        </p>
      </header>

      <AuthPanel />
      <TranslatorPanel />
    </main>
  );
}
