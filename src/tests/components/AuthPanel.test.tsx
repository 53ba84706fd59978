// @vitest-environment jsdom
import { beforeEach, describe, expect, it } from 'vitest';
import { render, screen } from '@testing-library/react';
import { AuthPanel } from '@/components/account/AuthPanel';
import { __resetMockClerkState, __setMockClerkState } from '@/tests/mocks/clerkNextjsMock';

describe('AuthPanel', () => {
  beforeEach(() => {
    __resetMockClerkState();
  });

  it('offers sign-in to visitors', () => {
    render(<AuthPanel />);

    expect(screen.getByRole('button', { name: 'Sign in' })).toBeInTheDocument();
    expect(screen.queryByRole('link', { name: 'View history' })).not.toBeInTheDocument();
  });

  it('links signed-in users to their history', () => {
    __setMockClerkState({
      isSignedIn: true,
      userId: 'user_1',
      user: { firstName: 'Ada', lastName: 'Lovelace' },
    });

    render(<AuthPanel />);

    expect(screen.getByText('Ada Lovelace')).toBeInTheDocument();
    expect(screen.getByRole('link', { name: 'View history' })).toHaveAttribute('href', '/history');
  });
});
