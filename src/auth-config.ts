/**
 * API-key header detection
 *
 * Only a single API-key header is supported. The first `apiKey` scheme in
 * `components.securitySchemes` wins, whatever its position in the top-level
 * `security` requirements.
 */

import { DEFAULTS } from './constants.js';
import type { ApiDocument } from './types/openapi.js';
import type { AuthConfig } from './types/tool.js';

export function extractAuthConfig(document: ApiDocument): AuthConfig | undefined {
  for (const scheme of Object.values(document.components.securitySchemes)) {
    if (scheme.type === 'apiKey') {
      return { headerName: scheme.name || DEFAULTS.API_KEY_HEADER };
    }
  }
  return undefined;
}
