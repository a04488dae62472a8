import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { getToken } from 'next-auth/jwt';
import { can, parseRole, requiredCapabilityFor } from '@/lib/permissions';

// The edge runtime cannot load the database driver that lib/auth pulls in,
// so the session check reads the JWT directly.
export async function middleware(req: NextRequest) {
  const { pathname } = req.nextUrl;

  // Auth.js v5 uses AUTH_SECRET (NEXTAUTH_SECRET still supported in some setups).
  // With the wrong secret getToken() returns null and everything redirects to /login.
  const secret = process.env.AUTH_SECRET ?? process.env.NEXTAUTH_SECRET;

  const token = await getToken({
    req,
    secret,
    // "__Secure-authjs.session-token" over HTTPS, "authjs.session-token" locally.
    secureCookie: process.env.NODE_ENV === 'production',
  });

  if (pathname === '/login') {
    if (token) {
      return NextResponse.redirect(new URL('/backoffice', req.url));
    }
    return NextResponse.next();
  }

  if (!token) {
    return NextResponse.redirect(new URL('/login', req.url));
  }

  const capability = requiredCapabilityFor(pathname);
  if (capability && !can(parseRole(token.role), capability)) {
    return NextResponse.redirect(new URL('/backoffice', req.url));
  }

  return NextResponse.next();
}

export const config = {
  matcher: ['/login', '/backoffice/:path*'],
};
