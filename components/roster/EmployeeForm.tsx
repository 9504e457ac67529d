'use client';

/**
 * @fileoverview Shared add / edit form driven by the roster field catalog.
 * Select fields draw their options from the current roster.
 */

import React from 'react';
import type { RosterTable } from '@/types/roster';
import { getDropdownOptions, ROSTER_FIELDS, type FieldGroup, type FormValues, type RosterFieldDef } from '@/lib/roster-fields';

interface EmployeeFormProps {
  table: RosterTable;
  values: FormValues;
  onChange: (key: string, value: string) => void;
}

const GROUP_TITLES: Record<FieldGroup, string> = {
  profile: 'Employee Details',
  training: 'Training',
};

function FieldInput({ field, table, value, onChange }: {
  field: RosterFieldDef;
  table: RosterTable;
  value: string;
  onChange: (value: string) => void;
}) {
  const id = `field-${field.key.replace(/\W+/g, '-')}`;
  const label = field.required ? `${field.label} *` : field.label;

  let control: React.ReactNode;
  if (field.kind === 'select') {
    control = (
      <select id={id} value={value} onChange={(e) => onChange(e.target.value)}>
        {getDropdownOptions(table, field, value).map((opt) => (
          <option key={opt} value={opt}>{opt || '(none)'}</option>
        ))}
      </select>
    );
  } else {
    control = (
      <input
        id={id}
        className="text-input"
        type={field.kind === 'date' ? 'date' : 'text'}
        value={value}
        required={field.required}
        onChange={(e) => onChange(e.target.value)}
      />
    );
  }

  return (
    <div className="form-field">
      <label htmlFor={id}>{label}</label>
      {control}
    </div>
  );
}

export default function EmployeeForm({ table, values, onChange }: EmployeeFormProps) {
  const groups: FieldGroup[] = ['profile', 'training'];

  return (
    <>
      {groups.map((group) => (
        <fieldset key={group} className="form-group">
          <legend>{GROUP_TITLES[group]}</legend>
          <div className="form-grid">
            {ROSTER_FIELDS.filter((f) => f.group === group).map((field) => (
              <FieldInput
                key={field.key}
                field={field}
                table={table}
                value={values[field.key] ?? ''}
                onChange={(v) => onChange(field.key, v)}
              />
            ))}
          </div>
        </fieldset>
      ))}
    </>
  );
}
