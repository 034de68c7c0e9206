/** "Work Projects:" -> "Work Projects". The import tool adds its own colon to section names. */
export function formatSection(listName: string): string {
  if (!listName) return '';
  if (listName.endsWith(':')) return listName.slice(0, -1).trimEnd();
  return listName;
}
