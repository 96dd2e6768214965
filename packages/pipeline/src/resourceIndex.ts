import { Parser } from 'htmlparser2';

export type ResourceUri = string;

export interface ResolveIndexOptions {
  /** Keep only links containing this substring; empty keeps everything. */
  extensionFilter?: string;
  /** Join links onto the listing url (default) or return bare names without a trailing slash. */
  absolute?: boolean;
}

const PARENT_LINKS = new Set(['../', '..']);

function extractAnchorTargets(html: string): string[] {
  const targets: string[] = [];
  const parser = new Parser(
    {
      onopentag(name, attributes) {
        if (name !== 'a') {
          return;
        }
        const href = attributes.href;
        if (href !== undefined && !PARENT_LINKS.has(href)) {
          targets.push(href);
        }
      }
    },
    { decodeEntities: true, lowerCaseTags: true }
  );
  parser.write(html);
  parser.end();
  return targets;
}

/**
 * Extracts the child links of a directory listing page in document order.
 */
export function parseResourceListing(
  html: string,
  listingUri: string,
  options: ResolveIndexOptions = {}
): ResourceUri[] {
  const filter = options.extensionFilter ?? '';
  const absolute = options.absolute ?? true;

  let links = extractAnchorTargets(html);
  if (filter) {
    links = links.filter((link) => link.includes(filter));
  }

  if (!absolute) {
    return links.map((link) => link.replace(/\/+$/, ''));
  }
  const base = listingUri.endsWith('/') ? listingUri : `${listingUri}/`;
  return links.map((link) => new URL(link, base).toString());
}
