import { load } from "cheerio";
import type { RowDescriptor } from "../types";

/** Structural selectors of the judgments listing table. */
export const LISTING_SELECTORS = {
  row: "table tbody tr",
  title: "td.views-field-title, td.views-field.views-field-title",
  caseNumber: "td.views-field-field-document-number-hidden",
  deliveredOn: "td.views-field-field-delivered-on",
  download: "td.views-field-nothing-1 a.faDownload, td .faDownload",
  nextPage: "nav.pager li.pager__item--next a",
} as const;

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Resolves `href` against the portal origin. Undefined when it cannot be made into an
 * http(s) URL; bare fragments such as `#` count as unresolvable.
 */
export function resolveAgainstOrigin(href: string | undefined, origin: string): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return undefined;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, origin);
  } catch {
    return undefined;
  }
  return resolved.protocol === "http:" || resolved.protocol === "https:" ? resolved.toString() : undefined;
}

/**
 * Reads one listing page. Rows without a resolvable download link are skipped.
 * `pageIndex` is left at 0 for the caller to assign.
 */
export function parseListingRows(html: string, origin: string): RowDescriptor[] {
  const $ = load(html);
  const rows: RowDescriptor[] = [];

  $(LISTING_SELECTORS.row).each((_, element) => {
    const row = $(element);
    const pdfUrl = resolveAgainstOrigin(row.find(LISTING_SELECTORS.download).first().attr("href"), origin);
    if (!pdfUrl) {
      return;
    }

    const caseNumberCell = row.find(LISTING_SELECTORS.caseNumber).first();
    rows.push({
      title: collapseWhitespace(row.find(LISTING_SELECTORS.title).first().text()),
      caseNumber: collapseWhitespace(caseNumberCell.text()),
      deliveredOnRaw: collapseWhitespace(row.find(LISTING_SELECTORS.deliveredOn).first().text()),
      pdfUrl,
      pdfPreviewUrl: resolveAgainstOrigin(caseNumberCell.find("a").first().attr("href"), origin) ?? "",
      pageIndex: 0,
    });
  });

  return rows;
}

export function hasNextPageLink(html: string): boolean {
  return load(html)(LISTING_SELECTORS.nextPage).length > 0;
}
