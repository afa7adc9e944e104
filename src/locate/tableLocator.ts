import { load } from "cheerio";
import type { TableFragment } from "../types";

export const DEFAULT_MIN_TABLE_TEXT_LENGTH = 100;

export interface LocateOptions {
  minTableTextLength?: number;
}

const TEXT_NODE = 3;

/**
 * Every `<table>` (nested ones too) in document order whose stripped text is
 * longer than the threshold. Shorter tables are layout scaffolding in older
 * filings.
 */
export function locateTables(documentName: string, text: string, options: LocateOptions = {}): TableFragment[] {
  const minLength = options.minTableTextLength ?? DEFAULT_MIN_TABLE_TEXT_LENGTH;
  const $ = load(text);
  const fragments: TableFragment[] = [];

  $("table").each((_, element) => {
    let textLength = 0;
    $(element)
      .find("*")
      .addBack()
      .contents()
      .each((__, node) => {
        if (node.nodeType === TEXT_NODE) {
          textLength += $(node).text().trim().length;
        }
      });

    if (textLength <= minLength) {
      return;
    }

    fragments.push({
      documentName,
      index: fragments.length,
      html: $.html(element),
    });
  });

  return fragments;
}
