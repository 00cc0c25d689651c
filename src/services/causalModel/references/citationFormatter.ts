/**
 * @fileoverview Renders stored references as citations. RIS output comes
 * from the RIS writer; BibTeX and text bibliographies come from
 * citation-js through CSL-JSON.
 * @module src/services/causalModel/references/citationFormatter
 */

import Cite from "citation-js";
import { logger, type RequestContext } from "../../../utils/index.js";
import { formatRis } from "../../RIS/index.js";
import type { Reference } from "../core/modelTypes.js";
import { referenceToRisRecord } from "./referenceMapper.js";

export const CITATION_STYLES = ["ris", "bibtex", "apa_string", "harvard_string", "vancouver_string"] as const;
export type CitationStyle = (typeof CITATION_STYLES)[number];

export type FormattedCitations = Partial<Record<CitationStyle, string>>;

const BIBLIOGRAPHY_TEMPLATES: Record<Exclude<CitationStyle, "ris" | "bibtex">, string> = {
  apa_string: "apa",
  harvard_string: "harvard1",
  vancouver_string: "vancouver",
};

const RIS_TO_CSL_TYPE: Record<string, string> = {
  JOUR: "article-journal",
  EJOUR: "article-journal",
  MGZN: "article-magazine",
  NEWS: "article-newspaper",
  BOOK: "book",
  EBOOK: "book",
  EDBOOK: "book",
  CHAP: "chapter",
  ECHAP: "chapter",
  CONF: "paper-conference",
  CPAPER: "paper-conference",
  THES: "thesis",
  RPRT: "report",
  ELEC: "webpage",
  BLOG: "post-weblog",
  DATA: "dataset",
  PAT: "patent",
};

/** Types whose RIS "publisher" is really the periodical carrying the work. */
const PERIODICAL_TYPES = new Set(["article-journal", "article-magazine", "article-newspaper"]);

type CslName = { family: string; given?: string } | { literal: string };

function toCslName(author: string): CslName {
  const [family, ...rest] = author.split(",").map((part) => part.trim());
  if (family && rest.length > 0) {
    return { family, given: rest.join(" ") };
  }
  return { literal: author };
}

/** CSL-JSON form of a reference, without empty properties. */
export function referenceToCsl(reference: Reference): Record<string, unknown> {
  const type = RIS_TO_CSL_TYPE[reference.publicationType ?? ""] ?? "article";
  const csl: Record<string, unknown> = {
    id: reference.refId,
    type,
    title: reference.title,
  };
  if (reference.authors?.length) {
    csl.author = reference.authors.map(toCslName);
  }
  const year = reference.year ? Number.parseInt(reference.year, 10) : Number.NaN;
  if (!Number.isNaN(year)) {
    csl.issued = { "date-parts": [[year]] };
  }
  if (reference.publisher) {
    csl[PERIODICAL_TYPES.has(type) ? "container-title" : "publisher"] = reference.publisher;
  }
  return csl;
}

/**
 * Formats `references` in every requested style; each style gives one text
 * holding all references.
 */
export function formatReferences(
  references: Reference[],
  styles: readonly CitationStyle[],
  context: RequestContext,
): FormattedCitations {
  const output: FormattedCitations = {};
  if (references.length === 0) {
    return output;
  }

  logger.debug("Formatting references", { ...context, count: references.length, styles });
  const needsCsl = styles.some((style) => style !== "ris");
  const cite = needsCsl ? new Cite(references.map(referenceToCsl)) : undefined;

  for (const style of styles) {
    if (style === "ris") {
      output.ris = formatRis(references.map(referenceToRisRecord));
    } else if (!cite) {
      continue;
    } else if (style === "bibtex") {
      output.bibtex = cite.format("bibtex");
    } else {
      output[style] = cite.format("bibliography", {
        format: "text",
        template: BIBLIOGRAPHY_TEMPLATES[style],
      });
    }
  }
  return output;
}
