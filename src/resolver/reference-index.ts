// Reference Resolver: identifier indexes over one document, built once and shared
// read-only by both rule sets. Building never fails; lookups that miss return
// undefined (or an `unresolved` resolution) for rules to report.

import { DOCUMENT_SPDX_ID, EXTERNAL_ELEMENT_PATTERN, NOASSERTION, NONE } from '../constants';
import { EntityTarget, walkEntities } from '../model/entities';
import { ExternalDocumentRef, ExtractedLicensingInfo, SpdxDocument } from '../model/spdx-document';

export interface DuplicateIdentifier {
  id: string;
  ownerLocation: string; // entity slot the duplicate is reported under
  field: string; // relative to ownerLocation
  firstLocation: string; // canonical occurrence
}

export type ElementResolution =
  | { kind: 'local'; target: EntityTarget }
  | { kind: 'external'; documentRef: string; elementId: string; externalDocument: ExternalDocumentRef }
  | { kind: 'special'; value: string }
  | { kind: 'unresolved'; reason: string };

export class ReferenceIndex {
  readonly targets: readonly EntityTarget[];
  private readonly byId = new Map<string, EntityTarget>();
  private readonly licenseRefs = new Map<string, ExtractedLicensingInfo>();
  private readonly externalDocuments = new Map<string, ExternalDocumentRef>();
  private readonly duplicateList: DuplicateIdentifier[] = [];
  private readonly duplicatesByOwner = new Map<string, DuplicateIdentifier[]>();

  constructor(readonly document: SpdxDocument) {
    this.targets = walkEntities(document);
    for (const target of this.targets) {
      if (target.kind === 'relationship' || !target.spdxId) continue;
      if (target.kind === 'extractedLicensingInfo') {
        const first = this.licenseRefs.get(target.spdxId);
        if (first) this.addDuplicate({ id: target.spdxId, ownerLocation: target.location, field: 'licenseId', firstLocation: first.location });
        else this.licenseRefs.set(target.spdxId, target.entity);
        continue;
      }
      const first = this.byId.get(target.spdxId);
      if (first) this.addDuplicate({ id: target.spdxId, ownerLocation: target.location, field: 'SPDXID', firstLocation: first.location });
      else this.byId.set(target.spdxId, target);
    }
    (document.externalDocumentRefs || []).forEach((ref, i) => {
      if (!ref.externalDocumentId) return;
      const first = this.externalDocuments.has(ref.externalDocumentId);
      if (first) {
        const firstIndex = (document.externalDocumentRefs || []).findIndex(r => r.externalDocumentId === ref.externalDocumentId);
        this.addDuplicate({ id: ref.externalDocumentId, ownerLocation: document.location, field: `externalDocumentRefs[${i}].externalDocumentId`, firstLocation: `externalDocumentRefs[${firstIndex}]` });
      } else {
        this.externalDocuments.set(ref.externalDocumentId, ref);
      }
    });
  }

  private addDuplicate(duplicate: DuplicateIdentifier) {
    this.duplicateList.push(duplicate);
    const owned = this.duplicatesByOwner.get(duplicate.ownerLocation) || [];
    owned.push(duplicate);
    this.duplicatesByOwner.set(duplicate.ownerLocation, owned);
  }

  get duplicates(): readonly DuplicateIdentifier[] {
    return this.duplicateList;
  }

  duplicatesAt(location: string): readonly DuplicateIdentifier[] {
    return this.duplicatesByOwner.get(location) || [];
  }

  // First occurrence wins for duplicated identifiers.
  resolve(id: string): EntityTarget | undefined {
    return this.byId.get(id);
  }

  resolveLicenseRef(id: string): ExtractedLicensingInfo | undefined {
    return this.licenseRefs.get(id);
  }

  resolveExternalDocument(documentRef: string): ExternalDocumentRef | undefined {
    return this.externalDocuments.get(documentRef);
  }

  // Relationship endpoints: local SPDXIDs, DocumentRef-x:SPDXRef-y, or (when allowed) NONE / NOASSERTION.
  resolveElementReference(id: string, allowSpecial = false): ElementResolution {
    if (id === NONE || id === NOASSERTION) {
      return allowSpecial ? { kind: 'special', value: id } : { kind: 'unresolved', reason: `${id} is only allowed as relatedSpdxElement` };
    }
    const local = this.resolve(id);
    if (local) return { kind: 'local', target: local };
    const external = EXTERNAL_ELEMENT_PATTERN.exec(id);
    if (external) {
      const externalDocument = this.resolveExternalDocument(external[1]);
      if (externalDocument) return { kind: 'external', documentRef: external[1], elementId: external[2], externalDocument };
      return { kind: 'unresolved', reason: `${external[1]} is not declared in externalDocumentRefs` };
    }
    return { kind: 'unresolved', reason: 'no element with this SPDXID exists in the document' };
  }

  // Elements the document describes: documentDescribes, DESCRIBES from the document
  // and DESCRIBED_BY pointing at it. First-seen order, de-duplicated.
  describedElementIds(): string[] {
    const documentId = this.document.SPDXID || DOCUMENT_SPDX_ID;
    const described: string[] = [];
    const add = (id: string | undefined) => {
      if (id && !described.includes(id)) described.push(id);
    };
    (this.document.documentDescribes || []).forEach(add);
    for (const rel of this.document.relationships) {
      if (rel.relationshipType === 'DESCRIBES' && rel.spdxElementId === documentId) add(rel.relatedSpdxElement);
      if (rel.relationshipType === 'DESCRIBED_BY' && rel.relatedSpdxElement === documentId) add(rel.spdxElementId);
    }
    return described;
  }
}

export function buildReferenceIndex(document: SpdxDocument): ReferenceIndex {
  return new ReferenceIndex(document);
}
