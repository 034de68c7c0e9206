/** Upper-case the first character, lower-case the rest ("jOHN" -> "John") */
export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Display name from an email address:
 * "john.doe@company.com" -> "John Doe", "admin@company.com" -> "Admin".
 */
export function deriveAssigneeName(email: string | undefined): string {
  if (!email) return '';
  const localPart = email.split('@')[0] ?? '';
  if (localPart.includes('.')) {
    return localPart.split('.').map(capitalize).join(' ');
  }
  return capitalize(localPart);
}
