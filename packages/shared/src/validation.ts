/**
 * Shared field-level validators for bursary application forms.
 * Each validator returns an error message key or null if valid.
 */

const KENYAN_MOBILE_RE = /^\+254[17]\d{8}$/;
const NATIONAL_ID_RE = /^\d{6,10}$/;

// ── Normalisers ─────────────────────────────────────────────────────────

/**
 * Convert a Kenyan phone number to `+254…` form.
 *
 *   "0712 345-678" → "+254712345678"
 *   "254712345678" → "+254712345678"
 *   "+254712345678" is returned unchanged
 *   anything else gets "+254" prepended
 */
export function normalizeKenyanPhone(value: string): string {
  const phone = value.replace(/[\s-]/g, "");
  if (phone.startsWith("+254")) return phone;
  if (phone.startsWith("254")) return `+${phone}`;
  if (phone.startsWith("0")) return `+254${phone.slice(1)}`;
  return `+254${phone}`;
}

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

// ── Individual validators ───────────────────────────────────────────────

export function validateEmail(value: string): string | null {
  if (!value) return null; // emptiness handled by required check
  const atIdx = value.indexOf("@");
  if (atIdx < 1) return "validation.email";
  const dotIdx = value.indexOf(".", atIdx);
  if (dotIdx < 0 || dotIdx === value.length - 1) return "validation.email";
  return null;
}

export function validateKenyanPhone(value: string): string | null {
  if (!value) return null;
  if (/[^\d\s+-]/.test(value)) return "validation.phone";
  if (!KENYAN_MOBILE_RE.test(normalizeKenyanPhone(value))) return "validation.phone";
  return null;
}

export function validateNationalId(value: string): string | null {
  if (!value) return null;
  if (!NATIONAL_ID_RE.test(value.trim())) return "validation.national_id";
  return null;
}

