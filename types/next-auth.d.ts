import type { DefaultSession } from 'next-auth';
import type { Role } from '@/lib/constants/enums';

declare module 'next-auth' {
  interface User {
    role?: Role;
  }

  interface Session {
    user: {
      id: string;
      role: Role;
    } & DefaultSession['user'];
    /** Per-session token every state-changing request must echo back. */
    csrfToken: string;
  }
}

declare module 'next-auth/jwt' {
  interface JWT {
    id?: string;
    role?: Role;
    csrfToken?: string;
  }
}
