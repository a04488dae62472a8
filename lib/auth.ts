import NextAuth, { CredentialsSignin } from 'next-auth';
import type { Provider } from 'next-auth/providers';
import Credentials from 'next-auth/providers/credentials';
import MicrosoftEntraID from 'next-auth/providers/microsoft-entra-id';
import { clientIp } from './client-ip';
import { getConfig } from './config';
import { LOGIN_RATE_LIMITED_CODE } from './constants/auth';
import { generateCsrfToken } from './csrf';
import { getPool } from './db';
import { parseRole } from './permissions';
import { authorizeCredentials, authorizeSsoUser, LoginRateLimitedError } from './users';

export const MICROSOFT_PROVIDER_ID = 'microsoft-entra-id';

/** Reaches the login form as `code` on the sign-in result. */
class RateLimitedSignin extends CredentialsSignin {
  code = LOGIN_RATE_LIMITED_CODE;
}

export const {
  handlers: { GET, POST },
  auth,
  signIn,
  signOut,
} = NextAuth(() => {
  const config = getConfig();

  const providers: Provider[] = [
    Credentials({
      name: 'credentials',
      credentials: {
        email: { label: 'E-Mail', type: 'email' },
        password: { label: 'Passwort', type: 'password' },
      },
      authorize: async (credentials, request) => {
        try {
          return await authorizeCredentials(getPool(), credentials, {
            ipAddress: clientIp(request.headers),
            userAgent: request.headers.get('user-agent'),
          });
        } catch (error) {
          if (error instanceof LoginRateLimitedError) throw new RateLimitedSignin();
          throw error;
        }
      },
    }),
  ];

  const { microsoft } = config.auth;
  if (microsoft) {
    providers.push(
      MicrosoftEntraID({
        clientId: microsoft.clientId,
        clientSecret: microsoft.clientSecret,
        issuer: `https://login.microsoftonline.com/${microsoft.tenantId}/v2.0`,
      })
    );
  }

  return {
    trustHost: true, // required behind a reverse proxy (trust X-Forwarded-Host)
    secret: config.auth.secret,
    session: {
      strategy: 'jwt',
      maxAge: config.auth.sessionMaxAge,
    },
    pages: {
      signIn: '/login',
      error: '/login',
    },
    providers,
    callbacks: {
      async signIn({ user, account }) {
        if (account?.provider !== MICROSOFT_PROVIDER_ID) return true;
        // SSO accounts map onto existing members; nobody is created here.
        const member = await authorizeSsoUser(getPool(), user.email);
        if (!member) return false;
        user.id = member.id;
        user.name = member.name;
        user.role = member.role;
        return true;
      },
      async jwt({ token, user }) {
        if (user) {
          token.id = user.id;
          token.role = parseRole(user.role);
          token.csrfToken = generateCsrfToken();
        }
        return token;
      },
      async session({ session, token }) {
        session.user.id = token.id ?? '';
        session.user.role = parseRole(token.role);
        session.csrfToken = token.csrfToken ?? '';
        return session;
      },
    },
  };
});
