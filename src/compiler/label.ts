export const PARAGRAPH_BREAK = "\n\n";

const BLOCK_TAGS = new Set(["div", "p", "li", "ul", "ol", "h1", "h2", "h3", "h4", "h5", "h6", "blockquote", "pre"]);
const TOKEN_RE = /<(\/?)([A-Za-z][A-Za-z0-9-]*)\b[^>]*>|<!--[\s\S]*?-->|([^<]+)|</gu;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/giu, (whole, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      const code = Number.parseInt(body.slice(2), 16);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    if (body.startsWith("#")) {
      const code = Number.parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? whole;
  });
}

/**
 * Splits an HTML label into line chunks. Block elements and `<br>` delimit
 * chunks; a block holding nothing (or only a `<br>`) yields one empty chunk.
 */
export function labelChunks(raw: string): string[] {
  const chunks: string[] = [];
  let current = "";
  let open = false;

  for (const match of raw.matchAll(TOKEN_RE)) {
    const [whole, closing, tagName, text] = match;
    if (text !== undefined || whole === "<") {
      current += decodeEntities(text ?? whole);
      open = true;
      continue;
    }
    if (!tagName) {
      continue;
    }

    const tag = tagName.toLowerCase();
    if (tag === "br") {
      chunks.push(current);
      current = "";
      open = false;
      continue;
    }
    if (!BLOCK_TAGS.has(tag)) {
      continue;
    }

    if (closing) {
      if (open) {
        chunks.push(current);
      }
      current = "";
      open = false;
      continue;
    }

    if (current) {
      chunks.push(current);
      current = "";
    }
    open = true;
  }

  if (open) {
    chunks.push(current);
  }
  return chunks;
}

export function joinChunks(chunks: string[]): string {
  let out = "";
  let emptyRun = 0;

  for (const chunk of chunks) {
    if (!chunk.trim()) {
      emptyRun += 1;
      continue;
    }
    if (emptyRun >= 2 && out.trim()) {
      out = `${out.trimEnd()}${PARAGRAPH_BREAK}`;
    }
    out += chunk;
    emptyRun = 0;
  }

  return out.trim();
}

export function extractLabelText(raw: string): string {
  if (!raw.includes("<")) {
    return decodeEntities(raw).trim();
  }
  return joinChunks(labelChunks(raw));
}
