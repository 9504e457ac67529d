/**
 * @fileoverview 404 page with a link back to the roster console.
 *
 * @module app/not-found
 */

import Link from 'next/link';

export default function NotFound() {
  return (
    <div className="page-panel" style={{ textAlign: 'center', padding: '4rem 2rem' }}>
      <h1 className="page-title">404 - Page Not Found</h1>
      <p className="page-subtitle">The page you&apos;re looking for doesn&apos;t exist.</p>
      <Link href="/" className="btn btn-accent">
        Back to Roster
      </Link>
    </div>
  );
}
