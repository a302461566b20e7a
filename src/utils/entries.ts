import { Entry, Retention } from '../types';

/**
 * Human readable label for an entry, used in prompts and logs
 */
export function describeEntry(entry: Entry): string {
  switch (entry.type) {
  case 'path':
    return `Path <${entry.path}>`;
  case 'pattern':
    return entry.retention
      ? `Pattern <${entry.pattern}> keeping ${describeRetention(entry.retention)}`
      : `Pattern <${entry.pattern}>`;
  }
}

export function describeRetention(retention: Retention): string {
  switch (retention.kind) {
  case 'count':
    return `${retention.count} by ${retention.order}`;
  case 'exception':
    return retention.exception;
  }
}
