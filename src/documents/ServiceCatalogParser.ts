/**
 * Reads a service catalog exported as an HTML table (the ".xls" files the
 * catalog system produces are HTML too). One row per service:
 * name, description, optional start date.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { ValidationError } from '../errors.js';

export interface CatalogService {
  name: string;
  description: string;
  startDate: string;
}

const CATALOG_HEADER = /service|tjänst|ingress/i;

/** True when the first table's first row looks like a catalog header. */
export function isServiceCatalog(html: string): boolean {
  const table = parse(html).querySelector('table');
  const firstRow = table?.querySelector('tr');
  return firstRow ? CATALOG_HEADER.test(cellText(firstRow)) : false;
}

export function parseServiceCatalog(html: string): CatalogService[] {
  const table = parse(html).querySelector('table');
  if (!table) {
    throw new ValidationError('No table found in service catalog');
  }

  // Keyed by name: a repeated service keeps its first row
  const services = new Map<string, CatalogService>();

  table.querySelectorAll('tr').forEach((row, index) => {
    const cells = row.querySelectorAll('td, th');
    if (cells.length < 2) return;
    // Header rows: <th> cells, or a leading <td> row naming the columns
    if (cells[0].tagName === 'TH') return;
    if (index === 0 && CATALOG_HEADER.test(cellText(row))) return;

    const name = cellText(cells[0]);
    const description = cellText(cells[1]);
    const startDate = cells.length > 2 ? cellText(cells[2]) : '';

    if (name && description && !services.has(name)) {
      services.set(name, { name, description, startDate });
    }
  });

  return [...services.values()];
}

/** The text indexed for one service. */
export function serviceDocumentText(service: CatalogService): string {
  return [
    `Service: ${service.name}`,
    `Description: ${service.description}`,
    `Start date: ${service.startDate}`,
    'This is an existing service that can be used or developed to meet similar needs.',
  ].join('\n\n');
}

/** Visible text of an HTML document, for indexing plain HTML uploads. */
export function htmlToText(html: string): string {
  const root = parse(html);
  root.querySelectorAll('script, style').forEach((el) => el.remove());
  return root.structuredText;
}

function cellText(el: HTMLElement): string {
  return el.text.replace(/\s+/g, ' ').trim();
}
