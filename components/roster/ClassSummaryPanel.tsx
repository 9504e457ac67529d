'use client';

import React from 'react';
import { useRoster } from '@/lib/roster-context';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

export default function ClassSummaryPanel() {
  const { views, applyFiltersToClasses, setApplyFiltersToClasses } = useRoster();
  const { classSummaries, bootCampCompletion, viltCompletion } = views;

  if (classSummaries.length === 0) return null;

  return (
    <Card>
      <CardHeader
        title="Class Summary"
        subtitle="Students per class (top 20)"
        action={
          <label style={{ fontSize: '0.75rem', display: 'flex', gap: '0.35rem', alignItems: 'center' }}>
            <input
              type="checkbox"
              checked={applyFiltersToClasses}
              onChange={(e) => setApplyFiltersToClasses(e.target.checked)}
            />
            Apply filters
          </label>
        }
      />
      <CardBody>
        <div className="class-grid">
          {classSummaries.map((summary) => (
            <div key={summary.column}>
              <h4 className="section-title">{summary.column}</h4>
              <p style={{ fontSize: '0.72rem', color: 'var(--text-muted)', margin: '0 0 0.35rem' }}>
                {applyFiltersToClasses
                  ? `${summary.displayedStudents} of ${summary.totalStudents} students`
                  : `${summary.totalStudents} students`}
              </p>
              <table className="dm-table">
                <tbody>
                  {summary.classes.map((c) => (
                    <tr key={c.value}>
                      <td>{c.value}</td>
                      <td style={{ textAlign: 'right' }}>{c.count}</td>
                    </tr>
                  ))}
                  {summary.classes.length === 0 && (
                    <tr><td colSpan={2} className="empty-cell">No classes.</td></tr>
                  )}
                </tbody>
              </table>
            </div>
          ))}
        </div>
        {(bootCampCompletion || viltCompletion) && (
          <div style={{ display: 'flex', gap: '1.5rem', marginTop: '0.75rem', fontSize: '0.78rem' }}>
            {bootCampCompletion && (
              <span>
                Boot Camp: <strong>{bootCampCompletion.completed}</strong> completed,{' '}
                <strong>{bootCampCompletion.notCompleted}</strong> not completed
              </span>
            )}
            {viltCompletion && (
              <span>
                VILT: <strong>{viltCompletion.completed}</strong> completed,{' '}
                <strong>{viltCompletion.notCompleted}</strong> not completed
              </span>
            )}
          </div>
        )}
      </CardBody>
    </Card>
  );
}
