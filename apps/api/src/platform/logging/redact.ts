/**
 * Keeps the first two characters of the local part and the whole domain:
 * `elise@example.com` becomes `el****@example.com`.
 *
 * Input is trimmed. Addresses without a local part or domain, and local
 * parts shorter than three characters, come back unchanged.
 */
export function redactEmail(email: string): string {
  const trimmed = email.trim();
  const at = trimmed.indexOf('@');
  if (at <= 0 || at === trimmed.length - 1) {
    return trimmed;
  }

  const local = Array.from(trimmed.slice(0, at));
  if (local.length < 3) {
    return trimmed;
  }
  return `${local.slice(0, 2).join('')}****${trimmed.slice(at)}`;
}
