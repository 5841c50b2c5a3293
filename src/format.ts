// Formatting helpers shared by rules and report output

// Join provided (string | false) parts into a comma separated list.
// Falsy entries are skipped. Returned string does not include any prefix so
// callers can embed it inside custom messages.
export function missingList(parts: Array<string | false>): string {
  return parts.filter(Boolean).join(', ');
}

// Absolute JSON path from an entity location and a field relative to it.
export function joinPath(location: string, field: string): string {
  if (!location) return field;
  if (!field) return location;
  return field.startsWith('[') ? location + field : `${location}.${field}`;
}

// Human label for a location inside a document ('' is the root).
export function describeLocation(location: string): string {
  return location || 'document root';
}

export function quote(value: string): string {
  return JSON.stringify(value);
}
