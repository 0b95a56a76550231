/**
 * Text parsing for rendered listing cells
 */

/** Digits-only price ("1,234 crowns" → 1234); null when no digit is present */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const digits = text.replace(/[^\d]/g, "");
  if (!digits) return null;
  const n = Number(digits);
  return Number.isSafeInteger(n) ? n : null;
}

/** Current page number from pager text such as "Page 3 of 40" */
export function parsePageIndicator(text: string | null | undefined): number | null {
  const m = /Page\s+(\d+)/.exec(text ?? "");
  return m ? Number(m[1]) : null;
}

/** Total page count from pager text such as "Page 3 of 40" */
export function parseTotalPages(text: string | null | undefined): number | null {
  const m = /Page\s+\d+\s+of\s+(\d+)/.exec(text ?? "");
  return m ? Number(m[1]) : null;
}

/**
 * Splits a trailing quantity suffix off an item name:
 * "Iron Ore x5" → { name: "Iron Ore", quantity: 5 }
 */
export function splitQuantity(text: string): { name: string; quantity: number } {
  const trimmed = text.trim();
  const m = /^(.*\S)\s+x\s*(\d+)$/.exec(trimmed);
  if (m) {
    const quantity = Number(m[2]);
    if (quantity > 0) return { name: m[1], quantity };
  }
  return { name: trimmed, quantity: 1 };
}
