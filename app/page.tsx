'use client';

import { RosterProvider } from '@/lib/roster-context';
import RosterDashboard from '@/components/roster/RosterDashboard';

export default function HomePage() {
  return (
    <RosterProvider>
      <RosterDashboard />
    </RosterProvider>
  );
}
