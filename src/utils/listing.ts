import type { ObjectSummary } from '../types/storage';

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ENTITIES[char] ?? char);
}

function renderEntry(object: ObjectSummary): string {
  const lastModified = object.last_modified ? object.last_modified.toISOString() : '';
  return [
    '  <Contents>',
    `    <Key>${escapeXml(object.key)}</Key>`,
    `    <Size>${object.size}</Size>`,
    `    <LastModified>${lastModified}</LastModified>`,
    '  </Contents>',
  ].join('\n');
}

/**
 * ListBucketResult document, entries in backend order
 */
export function renderListing(bucket: string, prefix: string | undefined, objects: ObjectSummary[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<ListBucketResult>',
    `  <Name>${escapeXml(bucket)}</Name>`,
    `  <Prefix>${escapeXml(prefix ?? '')}</Prefix>`,
    ...objects.map(renderEntry),
    '</ListBucketResult>',
  ].join('\n');
}
