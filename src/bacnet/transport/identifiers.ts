/**
 * Numeric <-> hyphenated-name translation for BACnet enumerations.
 * Values missing from the tables (proprietary ranges) pass through as
 * their decimal string.
 */

import identifiers from './identifiers.json';

function invert(table: Record<string, number>): Map<number, string> {
  return new Map(Object.entries(table).map(([name, id]) => [id, name]));
}

function byNumber(table: Record<string, string>): Map<number, string> {
  return new Map(Object.entries(table).map(([id, name]) => [Number(id), name]));
}

const OBJECT_TYPE_IDS = new Map<string, number>(Object.entries(identifiers.objectTypes));
const OBJECT_TYPE_NAMES = invert(identifiers.objectTypes);
const PROPERTY_IDS = new Map<string, number>(Object.entries(identifiers.propertyIdentifiers));
const UNIT_NAMES = byNumber(identifiers.engineeringUnits);
const SEGMENTATION_NAMES = byNumber(identifiers.segmentation);

function lookup(table: Map<string, number>, kind: string, name: string): number {
  const id = table.get(name);
  if (id !== undefined) {
    return id;
  }
  if (/^\d+$/.test(name)) {
    return Number(name);
  }
  throw new RangeError(`Unknown ${kind}: ${name}`);
}

export function objectTypeId(name: string): number {
  return lookup(OBJECT_TYPE_IDS, 'object type', name);
}

export function objectTypeName(id: number): string {
  return OBJECT_TYPE_NAMES.get(id) ?? String(id);
}

export function propertyId(name: string): number {
  return lookup(PROPERTY_IDS, 'property identifier', name);
}


export function unitName(id: number): string {
  return UNIT_NAMES.get(id) ?? String(id);
}

export function segmentationName(id: number): string {
  return SEGMENTATION_NAMES.get(id) ?? String(id);
}
