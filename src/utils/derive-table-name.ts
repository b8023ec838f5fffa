/**
 * Converts a PascalCase type name to a snake_case pluralized table name.
 * E.g., "Order" -> "orders", "PurchaseOrder" -> "purchase_orders",
 * "HTTPCallback" -> "http_callbacks"
 */
export function deriveTableName(typeName: string): string {
  const snakeCase = typeName
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();

  return pluralize(snakeCase);
}

function pluralize(word: string): string {
  if (/[^aeiou]y$/.test(word)) {
    return `${word.slice(0, -1)}ies`;
  }
  if (/(s|x|z|ch|sh)$/.test(word)) {
    return `${word}es`;
  }
  return `${word}s`;
}
