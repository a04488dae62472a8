'use client';

import { useState } from 'react';
import { useRouter } from 'next/navigation';
import { signIn } from 'next-auth/react';
import { useForm } from 'react-hook-form';
import { zodResolver } from '@hookform/resolvers/zod';
import { z } from 'zod';
import { Loader2, LogIn } from 'lucide-react';
import { toast } from 'sonner';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import { LOGIN_RATE_LIMITED_CODE, LOGIN_RATE_LIMITED_MESSAGE } from '@/lib/constants/auth';

const loginSchema = z.object({
  email: z.string().trim().email('Bitte eine gültige E-Mail-Adresse eingeben'),
  password: z.string().min(1, 'Passwort ist erforderlich'),
});

type LoginData = z.infer<typeof loginSchema>;

interface LoginFormProps {
  microsoftEnabled: boolean;
  microsoftProviderId: string;
}

export function LoginForm({ microsoftEnabled, microsoftProviderId }: LoginFormProps) {
  const router = useRouter();
  const [isRedirecting, setIsRedirecting] = useState(false);
  const {
    register,
    handleSubmit,
    formState: { errors, isSubmitting },
  } = useForm<LoginData>({
    resolver: zodResolver(loginSchema),
    defaultValues: { email: '', password: '' },
  });

  const onSubmit = async (data: LoginData) => {
    const result = await signIn('credentials', { ...data, redirect: false });
    if (result?.code === LOGIN_RATE_LIMITED_CODE) {
      toast.error(LOGIN_RATE_LIMITED_MESSAGE);
      return;
    }
    if (!result || result.error) {
      toast.error('E-Mail oder Passwort ist falsch');
      return;
    }
    router.replace('/backoffice');
    router.refresh();
  };

  const onMicrosoft = async () => {
    setIsRedirecting(true);
    try {
      await signIn(microsoftProviderId, { callbackUrl: '/backoffice' });
    } catch (e) {
      console.error(e);
      toast.error('Anmeldung mit Microsoft fehlgeschlagen');
      setIsRedirecting(false);
    }
  };

  return (
    <div className="space-y-4">
      <form onSubmit={handleSubmit(onSubmit)} className="space-y-4">
        <div className="space-y-2">
          <Label htmlFor="email">E-Mail</Label>
          <Input id="email" type="email" autoComplete="email" {...register('email')} />
          {errors.email && <p className="text-sm text-red-600">{errors.email.message}</p>}
        </div>
        <div className="space-y-2">
          <Label htmlFor="password">Passwort</Label>
          <Input id="password" type="password" autoComplete="current-password" {...register('password')} />
          {errors.password && <p className="text-sm text-red-600">{errors.password.message}</p>}
        </div>
        <Button type="submit" className="w-full" disabled={isSubmitting}>
          {isSubmitting ? <Loader2 className="h-4 w-4 animate-spin" /> : <LogIn className="h-4 w-4" />}
          Anmelden
        </Button>
      </form>

      {microsoftEnabled && (
        <>
          <div className="flex items-center gap-2 text-xs text-muted-foreground">
            <span className="h-px flex-1 bg-border" />
            oder
            <span className="h-px flex-1 bg-border" />
          </div>
          <Button variant="outline" className="w-full" disabled={isRedirecting} onClick={() => void onMicrosoft()}>
            {isRedirecting && <Loader2 className="h-4 w-4 animate-spin" />}
            Mit Microsoft anmelden
          </Button>
        </>
      )}
    </div>
  );
}
