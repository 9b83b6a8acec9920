const MISSING_EMAIL = "n/a";

export function normalizeText(raw: string): string {
  return raw.trim().toLowerCase();
}

/** Lower-cased, trimmed email, or null when blank or the literal "n/a". */
export function normalizeEmail(raw: string | null | undefined): string | null {
  const email = normalizeText(raw ?? "");
  if (!email || email === MISSING_EMAIL) return null;
  return email;
}
