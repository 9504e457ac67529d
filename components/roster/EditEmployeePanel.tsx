'use client';

/**
 * @fileoverview Edit an existing employee, picked by work email.
 *
 * The form is seeded from the record as it is in the current roster; on
 * save the store re-resolves the email, so a stale pick surfaces as a
 * "not found" notice instead of editing the wrong row.
 */

import React, { useMemo, useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { cellToText } from '@/lib/data-normalization';
import { listEditableEmployees, recordToFormValues, type FormValues } from '@/lib/roster-fields';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';
import EmployeeForm from './EmployeeForm';

export default function EditEmployeePanel() {
  const { snapshot, identityColumn, updateEmployee } = useRoster();
  const [selected, setSelected] = useState('');
  const [values, setValues] = useState<FormValues | null>(null);

  const employees = useMemo(() => listEditableEmployees(snapshot, identityColumn), [snapshot, identityColumn]);

  const pick = (email: string) => {
    setSelected(email);
    const record = snapshot.rows.find((row) => cellToText(row[identityColumn] ?? null) === email);
    setValues(record ? recordToFormValues(record) : null);
  };

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (!values) return;
    if (updateEmployee(selected, values)) {
      // The identity may have been edited; follow the record
      setSelected(values[identityColumn] ?? selected);
    }
  };

  if (employees.length === 0) {
    return (
      <Card>
        <CardHeader title="Edit Employee" />
        <CardBody>
          <p style={{ fontSize: '0.78rem', color: 'var(--text-muted)' }}>No employees to edit. Upload a roster or add an employee first.</p>
        </CardBody>
      </Card>
    );
  }

  return (
    <Card>
      <CardHeader title="Edit Employee" subtitle={`${employees.length} employees`} />
      <CardBody>
        <div className="form-field" style={{ marginBottom: '0.75rem' }}>
          <label htmlFor="edit-employee-picker">Employee</label>
          <select id="edit-employee-picker" value={selected} onChange={(e) => pick(e.target.value)}>
            <option value="">Select an employee…</option>
            {employees.map((emp) => (
              <option key={emp.email} value={emp.email}>{emp.label}</option>
            ))}
          </select>
        </div>
        {values && (
          <form onSubmit={handleSubmit}>
            <EmployeeForm
              table={snapshot}
              values={values}
              onChange={(key, value) => setValues((prev) => (prev ? { ...prev, [key]: value } : prev))}
            />
            <div style={{ display: 'flex', gap: '0.5rem', marginTop: '0.75rem' }}>
              <Button type="submit" variant="accent">Save Changes</Button>
              <Button onClick={() => pick(selected)}>Revert</Button>
            </div>
          </form>
        )}
      </CardBody>
    </Card>
  );
}
