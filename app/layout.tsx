import type { Metadata, Viewport } from 'next';
import { SessionProvider } from 'next-auth/react';
import { Toaster } from 'sonner';
import './globals.css';

export const metadata: Metadata = {
  title: 'Intranet - Verwaltung',
  description: 'Interner Verwaltungsbereich für Mitglieder und Alumni',
};

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: '#0f172a',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="de">
      <body className="antialiased">
        <SessionProvider>{children}</SessionProvider>
        <Toaster position="top-center" richColors />
      </body>
    </html>
  );
}
