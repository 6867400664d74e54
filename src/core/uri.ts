import path from "node:path";
import { AUTHORITY_REGULATION, DocumentCategory, DocumentCoordinates } from "../types";

export const API_ROOT_SEGMENT = "/finlex/avoindata/v1";

// Most specific grammar first: authority regulations carry an extra segment.
const AUTHORITY_PATTERN =
  /^\/akn\/fi\/doc\/authority-regulation\/(?<authority>[^/]+)\/(?<year>\d+)\/(?<number>[^/]+)\/(?<lang>[^/]+)$/;

const STANDARD_PATTERN =
  /^\/akn\/fi\/(?<category>act|judgment|doc)\/(?<type>[^/]+)\/(?<year>\d+)\/(?<number>[^/]+)\/(?<lang>[^/]+)$/;

function isDocumentCategory(value: string): value is DocumentCategory {
  return value === "act" || value === "judgment" || value === "doc";
}

function decodePath(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    // Malformed escapes stay as written.
    return raw;
  }
}

function extractPath(uri: string): string | undefined {
  if (!uri.startsWith("http")) {
    return decodePath(uri);
  }

  let pathname: string;
  try {
    pathname = new URL(uri).pathname;
  } catch {
    return undefined;
  }

  const decoded = decodePath(pathname);
  const rootIndex = decoded.lastIndexOf(API_ROOT_SEGMENT);
  return rootIndex >= 0 ? decoded.slice(rootIndex + API_ROOT_SEGMENT.length) : decoded;
}

function isUnsafeSegment(segment: string): boolean {
  return segment === "." || segment === "..";
}

/**
 * Parses a document identifier (full URL or bare `/akn/...` path) into coordinates.
 * Returns `undefined` when the identifier matches neither grammar.
 */
export function resolveUri(uri: string): DocumentCoordinates | undefined {
  const documentPath = extractPath(uri);
  if (!documentPath) {
    return undefined;
  }

  let coords: DocumentCoordinates | undefined;

  const authorityMatch = AUTHORITY_PATTERN.exec(documentPath);
  if (authorityMatch?.groups) {
    const { authority, year, number, lang } = authorityMatch.groups;
    coords = {
      category: "doc",
      documentType: AUTHORITY_REGULATION,
      authority,
      year,
      number,
      langAndVersion: lang,
    };
  } else {
    const standardMatch = STANDARD_PATTERN.exec(documentPath);
    const groups = standardMatch?.groups;
    if (!groups || !isDocumentCategory(groups.category) || groups.type === AUTHORITY_REGULATION) {
      return undefined;
    }
    coords = {
      category: groups.category,
      documentType: groups.type,
      year: groups.year,
      number: groups.number,
      langAndVersion: groups.lang,
    };
  }

  return toStorageSegments(coords).some(isUnsafeSegment) ? undefined : coords;
}

export function toApiPath(coords: DocumentCoordinates): string {
  return `/akn/fi/${toStorageSegments(coords).join("/")}`;
}

export function toListPath(category: DocumentCategory, documentType: string): string {
  return `/akn/fi/${category}/${documentType}/list`;
}

export function toStorageSegments(coords: DocumentCoordinates): string[] {
  const segments = [coords.category, coords.documentType];
  if (coords.authority !== undefined) {
    segments.push(coords.authority);
  }
  segments.push(coords.year, coords.number, coords.langAndVersion);
  return segments;
}

/** Relative directory for a document, e.g. `act/statute/2024/123/fin@`. */
export function toStoragePath(coords: DocumentCoordinates): string {
  return path.join(...toStorageSegments(coords));
}
