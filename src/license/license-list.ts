// SPDX License List lookups backed by the spdx-license-ids / spdx-exceptions data packages.
// Identifiers match case-insensitively (SPDX 2.3 Annex D.2).

import * as fs from 'fs-extra';

function readIdList(moduleId: string): string[] {
  const data: unknown = fs.readJsonSync(require.resolve(moduleId));
  if (!Array.isArray(data)) throw new Error(`License list ${moduleId} is not an array`);
  return data.filter((v): v is string => typeof v === 'string');
}

function indexIds(ids: string[]): Map<string, string> {
  return new Map(ids.map((id): [string, string] => [id.toLowerCase(), id]));
}

let licenseIndex: Map<string, string> | null = null;
let exceptionIndex: Map<string, string> | null = null;

function licenses(): Map<string, string> {
  if (!licenseIndex) {
    licenseIndex = indexIds([...readIdList('spdx-license-ids'), ...readIdList('spdx-license-ids/deprecated.json')]);
  }
  return licenseIndex;
}

function exceptions(): Map<string, string> {
  if (!exceptionIndex) exceptionIndex = indexIds(readIdList('spdx-exceptions'));
  return exceptionIndex;
}

// Canonical spelling of a listed license id, or undefined when not on the list.
export function lookupLicenseId(id: string): string | undefined {
  return licenses().get(id.toLowerCase());
}

export function lookupExceptionId(id: string): string | undefined {
  return exceptions().get(id.toLowerCase());
}
