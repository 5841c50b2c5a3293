import { EntityKind } from '../types';
import {
  ExtractedLicensingInfo,
  SpdxDocument,
  SpdxFile,
  SpdxPackage,
  SpdxRelationship,
  SpdxSnippet
} from './spdx-document';

export interface EntityByKind {
  document: SpdxDocument;
  package: SpdxPackage;
  file: SpdxFile;
  snippet: SpdxSnippet;
  extractedLicensingInfo: ExtractedLicensingInfo;
  relationship: SpdxRelationship;
}

// One addressable entity of a document, as seen by rules and the resolver.
export interface TargetOf<K extends EntityKind> {
  kind: K;
  entity: EntityByKind[K];
  spdxId: string; // SPDXID, licenseId for extracted licenses, spdxElementId for relationships
  location: string;
}

export type EntityTarget = { [K in EntityKind]: TargetOf<K> }[EntityKind];

// Entity names as used in policy configuration files.
export const ENTITY_TYPE_NAMES: Record<EntityKind, string> = {
  document: 'Document',
  package: 'Package',
  file: 'File',
  snippet: 'Snippet',
  extractedLicensingInfo: 'ExtractedLicensingInfo',
  relationship: 'Relationship'
};

// Appearance order used for reports: document, packages, files, snippets,
// extracted licensing infos, relationships; each list in source order.
export function walkEntities(document: SpdxDocument): EntityTarget[] {
  const targets: EntityTarget[] = [{ kind: 'document', entity: document, spdxId: document.SPDXID || '', location: document.location }];
  for (const entity of document.packages) targets.push({ kind: 'package', entity, spdxId: entity.SPDXID || '', location: entity.location });
  for (const entity of document.files) targets.push({ kind: 'file', entity, spdxId: entity.SPDXID || '', location: entity.location });
  for (const entity of document.snippets) targets.push({ kind: 'snippet', entity, spdxId: entity.SPDXID || '', location: entity.location });
  for (const entity of document.hasExtractedLicensingInfos) {
    targets.push({ kind: 'extractedLicensingInfo', entity, spdxId: entity.licenseId || '', location: entity.location });
  }
  for (const entity of document.relationships) {
    targets.push({ kind: 'relationship', entity, spdxId: entity.spdxElementId || '', location: entity.location });
  }
  return targets;
}
