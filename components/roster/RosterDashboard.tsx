'use client';

/**
 * @fileoverview Roster console page body.
 *
 * Upload and export stay pinned above the tabs; the tabs switch between the
 * reporting views and the add / edit forms. Nothing below the upload panel
 * renders until a roster has columns.
 *
 * @module components/roster/RosterDashboard
 */

import React, { useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { BOOT_CAMP_COLUMN, TRANSFER_PROMO_COLUMN, VILT_COLUMN } from '@/lib/roster-metrics';
import NoticeBanner from './NoticeBanner';
import UploadPanel from './UploadPanel';
import OverviewMetrics from './OverviewMetrics';
import FilterBar from './FilterBar';
import GroupCountsTable from './GroupCountsTable';
import ClassSummaryPanel from './ClassSummaryPanel';
import TrainingCompletionTable from './TrainingCompletionTable';
import ClassStudentsPanel from './ClassStudentsPanel';
import RosterTable from './RosterTable';
import AddEmployeePanel from './AddEmployeePanel';
import EditEmployeePanel from './EditEmployeePanel';
import ExportPanel from './ExportPanel';

type TabKey = 'overview' | 'employees' | 'classes' | 'training' | 'add' | 'edit';

const TABS: { key: TabKey; label: string }[] = [
  { key: 'overview', label: 'Overview' },
  { key: 'employees', label: 'Employees' },
  { key: 'classes', label: 'Classes' },
  { key: 'training', label: 'Training Completion' },
  { key: 'add', label: 'Add Employee' },
  { key: 'edit', label: 'Edit Employee' },
];

export default function RosterDashboard() {
  const { snapshot, views } = useRoster();
  const [tab, setTab] = useState<TabKey>('overview');
  const hasRoster = snapshot.columns.length > 0;

  return (
    <div>
      <h1 className="page-title">Class Roster</h1>
      <p className="page-subtitle">
        Upload a roster, review class and training counts, and add or edit employees.
      </p>

      <NoticeBanner />

      <div className="panel-row">
        <UploadPanel />
        {hasRoster && <ExportPanel />}
      </div>

      <div style={{ display: 'flex', gap: '0.35rem', flexWrap: 'wrap', margin: '1rem 0 0.75rem' }}>
        {TABS.map((t) => (
          <button
            key={t.key}
            type="button"
            className={`btn${tab === t.key ? ' btn-accent' : ''}`}
            onClick={() => setTab(t.key)}
            style={{ fontSize: '0.72rem', padding: '0.35rem 0.65rem' }}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === 'add' && <AddEmployeePanel />}
      {tab === 'edit' && <EditEmployeePanel />}

      {!hasRoster && tab !== 'add' && tab !== 'edit' && (
        <div className="glass-solid empty-state">No roster loaded yet.</div>
      )}

      {hasRoster && (tab === 'overview' || tab === 'employees' || tab === 'classes' || tab === 'training') && (
        <>
          <FilterBar />
          {tab === 'overview' && (
            <div className="stack">
              <OverviewMetrics />
              <div className="panel-row">
                <GroupCountsTable title="Employees by Region" valueLabel="Region" counts={views.byRegion} />
                <GroupCountsTable title="Employees by Role" subtitle="Top 10" valueLabel="Role" counts={views.byRole} />
              </div>
              <ClassSummaryPanel />
            </div>
          )}
          {tab === 'employees' && <RosterTable />}
          {tab === 'classes' && (
            <div className="stack">
              <ClassStudentsPanel column={BOOT_CAMP_COLUMN} title="Students by Boot Camp Class" />
              <ClassStudentsPanel column={VILT_COLUMN} title="Students by VILT Class" />
              <ClassStudentsPanel column={TRANSFER_PROMO_COLUMN} title="Transfer/Promo Details" />
            </div>
          )}
          {tab === 'training' && <TrainingCompletionTable />}
        </>
      )}
    </div>
  );
}
