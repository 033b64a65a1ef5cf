/**
 * Helpers for emitting TypeScript source text
 */

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Single-quoted string literal
 */
export function stringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
  return `'${escaped}'`;
}

/**
 * Escape static text for use inside a template literal
 */
export function templateText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/`/g, '\\`')
    .replace(/\$\{/g, '\\${');
}

/**
 * Indent every non-empty line
 */
export function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map(line => (line.length > 0 ? pad + line : line))
    .join('\n');
}

/**
 * Object key: bare when it is an identifier, quoted otherwise
 */
export function objectKey(name: string): string {
  return IDENTIFIER.test(name) ? name : stringLiteral(name);
}

/**
 * Turn an arbitrary name into a method identifier
 *
 * Example: 'list-pets.v2' => 'list_pets_v2', '2fa' => '_2fa'
 */
export function toIdentifier(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_$]/g, '_');
  if (cleaned.length === 0) return '_';
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * PascalCase from free text; every word is capitalized and the rest lowered
 *
 * Example: 'Pet Store API' => 'PetStoreApi', '1Password' => '_1password'
 */
export function toPascalCase(text: string): string {
  const pascal = text
    .replace(/[^a-zA-Z0-9]/g, ' ')
    .split(' ')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('');
  return /^[0-9]/.test(pascal) ? `_${pascal}` : pascal;
}

/**
 * Service name used in the MCP handshake
 *
 * Example: 'Pet Store API' => 'pet-store-api'
 */
export function toServiceName(title: string): string {
  return title.toLowerCase().replace(/ /g, '-');
}
