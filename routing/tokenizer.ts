function foldAccents(text: string): string {
  return text.normalize("NFD").replaceAll(/[\u0300-\u036f]/g, "");
}

/** Lowercase, accent-folded text with every non-alphanumeric run collapsed to one space. */
export function normalizeText(text: string): string {
  return foldAccents(text)
    .toLowerCase()
    .replaceAll(/[^a-z0-9]+/g, " ")
    .trim();
}

export function tokenize(text: string): readonly string[] {
  const normalized = normalizeText(text);
  if (normalized.length === 0) return [];
  return normalized.split(" ");
}

const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;

export function stripControlCharacters(text: string): string {
  return text.replaceAll(CONTROL_CHARS, "");
}
