/**
 * Core concept transformation algebra (CCT)
 *
 * Spatial and statistical operators over value types and relations,
 * shipped as `catalogs/cct.json`.
 */

import { fileURLToPath } from 'node:url';
import { loadSignatureTable } from '../signature/config.js';
import type { SignatureTable } from '../signature/table.js';

export const cctCatalogPath = fileURLToPath(new URL('../../catalogs/cct.json', import.meta.url));

export function loadCct(): SignatureTable {
  return loadSignatureTable(cctCatalogPath);
}
