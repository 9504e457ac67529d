/**
 * @fileoverview Root layout for the class roster console.
 *
 * Provides global styles and the error boundary. The roster session itself
 * is mounted by the page so each page load gets a fresh store.
 *
 * @module app/layout
 */

import type { Metadata } from 'next';
import './globals.css';
import { ErrorBoundary } from '@/components/layout/ErrorBoundary';

export const metadata: Metadata = {
  title: 'Class Roster',
  description: 'Upload, review and edit training class rosters',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>
        <ErrorBoundary>
          <main className="main-content">
            {children}
          </main>
        </ErrorBoundary>
      </body>
    </html>
  );
}
