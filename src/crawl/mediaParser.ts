import { load } from "cheerio";
import { XMLValidator } from "fast-xml-parser";
import type { Logger } from "../observability";

const MEDIA_PREFIX = "media/";

function localName(tagName: string): string {
  const separator = tagName.indexOf(":");
  return separator >= 0 ? tagName.slice(separator + 1) : tagName;
}

/**
 * Collects `media/` references from an Akoma Ntoso document: `img/@src`,
 * `@href` on attachments and anything inside them, and `ref/@href`.
 * Namespace prefixes on element names are ignored. Duplicates are dropped.
 * Markup that is not well-formed XML yields no links.
 */
export function extractMediaLinks(xml: string | Buffer, logger?: Logger): string[] {
  const text = Buffer.isBuffer(xml) ? xml.toString("utf-8") : xml;
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    logger?.warn("media_links_malformed_xml", {
      error: validation.err.msg,
      line: validation.err.line,
    });
    return [];
  }

  const links = new Set<string>();

  try {
    const $ = load(text, { xml: true });

    $("*").each((_, element) => {
      if (!("name" in element)) {
        return;
      }
      const name = localName(element.name);
      const candidates: Array<string | undefined> = [];

      if (name === "img") {
        candidates.push($(element).attr("src"));
      }

      if (name === "ref") {
        candidates.push($(element).attr("href"));
      } else {
        const insideAttachment = [element, ...$(element).parents().toArray()].some(
          (node) => localName(node.name) === "attachment",
        );
        if (insideAttachment) {
          candidates.push($(element).attr("href"));
        }
      }

      for (const candidate of candidates) {
        if (candidate?.startsWith(MEDIA_PREFIX)) {
          links.add(candidate);
        }
      }
    });
  } catch (error) {
    logger?.warn("media_links_parse_failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  return [...links];
}
