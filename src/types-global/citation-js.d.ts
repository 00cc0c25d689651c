/**
 * @fileoverview Minimal typings for the parts of `citation-js` in use; the
 * package ships without declarations.
 */
declare module "citation-js" {
  export interface CiteFormatOptions {
    format?: "text" | "html" | "string" | "object";
    template?: string;
    lang?: string;
  }

  export default class Cite {
    constructor(data?: unknown);
    format(format: string, options?: CiteFormatOptions): string;
  }
}
