/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { OutputFormat } from '../types/index.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    // Nested objects/arrays as compact JSON
    return JSON.stringify(value);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  if (columns) {
    return columns;
  }
  const first = data[0];
  return isRecord(first) ? Object.keys(first) : [];
}

function cell(row: unknown, col: string): string {
  return isRecord(row) ? valueToString(row[col]) : '';
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  // Column widths, in column order
  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => cell(row, col).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));

  for (const row of data) {
    lines.push(detectedColumns.map((col, i) => cell(row, col).padEnd(widths[i] ?? 0)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.join(','));

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const str = cell(row, col);
      // Escape CSV values
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (typeof data === 'object' && data !== null) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  // Handle primitives
  return String(data);
}
