export interface Page {
  /** 1-based. */
  page: number;
  totalPages: number;
  totalChars: number;
  content: string;
}

/**
 * Slice `text` into fixed-size chunks and return chunk `page` (1-based).
 * Out-of-range pages are clamped; empty text is one empty page.
 */
export function paginate(text: string, pageSize: number, page = 1): Page {
  const size = Math.max(1, Math.floor(pageSize));
  const totalPages = Math.max(1, Math.ceil(text.length / size));
  const current = Math.min(totalPages, Math.max(1, Math.floor(page)));
  const start = (current - 1) * size;
  return { page: current, totalPages, totalChars: text.length, content: text.slice(start, start + size) };
}

/** Cap output at `maxChars`, marking the cut so nothing is dropped silently. */
export function capOutput(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  const note = `\n[... truncated at ${maxChars} of ${text.length} characters]`;
  return { text: text.slice(0, Math.max(0, maxChars - note.length)) + note, truncated: true };
}

/**
 * Lines matching `pattern` (case-insensitive regex; taken literally if it does
 * not compile), each with `context` lines around it. Non-adjacent groups are
 * separated by "--".
 */
export function grepLines(text: string, pattern: string, context = 0): { text: string; matches: number } {
  let re: RegExp;
  try {
    re = new RegExp(pattern, "i");
  } catch {
    re = new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "i");
  }
  const lines = text.split(/\r?\n/);
  const keep = new Set<number>();
  let matches = 0;
  lines.forEach((line, i) => {
    if (!re.test(line)) return;
    matches++;
    for (let j = Math.max(0, i - context); j <= Math.min(lines.length - 1, i + context); j++) keep.add(j);
  });

  const out: string[] = [];
  let last = -1;
  for (const i of [...keep].sort((a, b) => a - b)) {
    if (last >= 0 && i > last + 1) out.push("--");
    out.push(lines[i] ?? "");
    last = i;
  }
  return { text: out.join("\n"), matches };
}
