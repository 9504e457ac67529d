'use client';

/**
 * @fileoverview Students of one class column, narrowed by a class picker,
 * with a CSV download of the current selection.
 */

import React, { useMemo, useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { cellToText } from '@/lib/data-normalization';
import { ALL_CLASSES, classDetailColumns, listClassOptions, studentsInClass } from '@/lib/roster-metrics';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

interface ClassStudentsPanelProps {
  column: string;
  title: string;
}

export default function ClassStudentsPanel({ column, title }: ClassStudentsPanelProps) {
  const { snapshot, filters, applyFiltersToClasses, downloadClassCsv } = useRoster();
  const [picked, setPicked] = useState(ALL_CLASSES);

  const options = useMemo(() => listClassOptions(snapshot, column), [snapshot, column]);
  // A class can disappear after an edit; fall back to every class
  const selected = options.includes(picked) ? picked : ALL_CLASSES;
  const students = useMemo(
    () => studentsInClass(snapshot, column, selected, filters, applyFiltersToClasses),
    [snapshot, column, selected, filters, applyFiltersToClasses],
  );
  const shown = useMemo(() => classDetailColumns(snapshot, column), [snapshot, column]);

  if (options.length === 0) return null;

  const classCount = options.length - 1;
  const summary = selected === ALL_CLASSES
    ? `Showing all ${students.rows.length} students across ${classCount} classes`
    : `Showing ${students.rows.length} students in ${selected}`;

  return (
    <Card>
      <CardHeader
        title={title}
        subtitle={summary}
        action={
          <Button size="sm" onClick={() => downloadClassCsv(column, selected)} disabled={students.rows.length === 0}>
            Download CSV
          </Button>
        }
      />
      <CardBody noPadding>
        <div className="form-field" style={{ padding: '0.5rem 0.75rem' }}>
          <label htmlFor={`class-picker-${column}`}>Class</label>
          <select id={`class-picker-${column}`} value={selected} onChange={(e) => setPicked(e.target.value)}>
            {options.map((opt) => (
              <option key={opt} value={opt}>{opt}</option>
            ))}
          </select>
        </div>
        <div style={{ overflow: 'auto', maxHeight: 420 }}>
          <table className="dm-table">
            <thead>
              <tr>
                {shown.map((col) => <th key={col}>{col}</th>)}
              </tr>
            </thead>
            <tbody>
              {students.rows.map((row, i) => (
                <tr key={i}>
                  {shown.map((col) => <td key={col}>{cellToText(row[col] ?? null)}</td>)}
                </tr>
              ))}
              {students.rows.length === 0 && (
                <tr><td colSpan={Math.max(shown.length, 1)} className="empty-cell">No students.</td></tr>
              )}
            </tbody>
          </table>
        </div>
      </CardBody>
    </Card>
  );
}
