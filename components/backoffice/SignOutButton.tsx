'use client';

import { signOut } from 'next-auth/react';
import { LogOut } from 'lucide-react';
import { Button } from '@/components/ui/button';

export function SignOutButton() {
  return (
    <Button variant="ghost" size="sm" onClick={() => void signOut({ callbackUrl: '/login' })} data-testid="sign-out">
      <LogOut className="h-4 w-4" />
      Abmelden
    </Button>
  );
}
