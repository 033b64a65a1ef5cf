/**
 * Operation name synthesis
 *
 * Why: Tools need a name even when the document omits `operationId`. The name
 * is derived from (path, method) alone, so two operations can end up with the
 * same name; DescriptorValidator reports those.
 */

const PATH_PARAM = /\{[^}]+\}/g;

/**
 * Verb prefix for a method
 *
 * POST becomes `create` only when the path itself spells it out
 * (e.g. /users/create), otherwise it stays `post`.
 */
export function methodPrefix(path: string, method: string): string {
  const lower = method.toLowerCase();
  switch (lower) {
    case 'get':
      return 'get';
    case 'post':
      return path.toLowerCase().includes('create') ? 'create' : 'post';
    case 'put':
      return 'update';
    case 'delete':
      return 'delete';
    default:
      return lower;
  }
}

/**
 * Derive an operation name from path and method
 *
 * Example: GET /users/{id}/posts => getUsersPosts
 */
export function synthesizeOperationId(path: string, method: string): string {
  const segments = path
    .replace(PATH_PARAM, '')
    .split('/')
    .filter(segment => segment.length > 0);

  const prefix = methodPrefix(path, method);

  if (segments.length === 0) {
    return `${prefix}Root`;
  }

  return prefix + segments.map(capitalize).join('');
}

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1);
}
