'use client';

import React from 'react';
import type { CompletionStatus } from '@/types/roster';
import { useRoster } from '@/lib/roster-context';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

function StatusCell({ status }: { status: CompletionStatus | null }) {
  if (status === null) return <td style={{ color: 'var(--text-muted)' }}>n/a</td>;
  return (
    <td style={{ color: status === 'Completed' ? 'var(--color-success)' : 'var(--color-error)' }}>
      {status}
    </td>
  );
}

export default function TrainingCompletionTable() {
  const { views, downloadTrainingCsv } = useRoster();
  const rows = views.trainingCompletion;

  return (
    <Card>
      <CardHeader
        title="Training Completion"
        subtitle={`${rows.length} employees`}
        action={
          <Button size="sm" onClick={downloadTrainingCsv} disabled={rows.length === 0}>
            Download Training Completion Data
          </Button>
        }
      />
      <CardBody noPadding>
        <div style={{ overflow: 'auto', maxHeight: 420 }}>
          <table className="dm-table">
            <thead>
              <tr>
                <th>Name</th>
                <th>Email</th>
                <th>Region</th>
                <th>Role</th>
                <th>Business Unit</th>
                <th>Boot Camp</th>
                <th>VILT</th>
                <th>Course Completion</th>
                <th>SE Capstone</th>
              </tr>
            </thead>
            <tbody>
              {rows.map((r, i) => (
                <tr key={`${r.email}-${i}`}>
                  <td>{r.name}</td>
                  <td>{r.email}</td>
                  <td>{r.region}</td>
                  <td>{r.role}</td>
                  <td>{r.businessUnit}</td>
                  <StatusCell status={r.bootCampStatus} />
                  <StatusCell status={r.viltStatus} />
                  <td>{r.courseCompletionDate ?? ''}</td>
                  <td>{r.seCapstoneDate ?? ''}</td>
                </tr>
              ))}
              {rows.length === 0 && (
                <tr><td colSpan={9} className="empty-cell">No employees.</td></tr>
              )}
            </tbody>
          </table>
        </div>
      </CardBody>
    </Card>
  );
}
