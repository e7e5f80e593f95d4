/**
 * Locate the bundled notes directory
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export function findNotesDir(): string {
  const searchPaths = [
    // Relative to CLI sources
    path.join(__dirname, '../../../../notes'),
    // Relative to CLI dist
    path.join(__dirname, '../../../../../notes'),
    // Development location from project root
    path.join(process.cwd(), 'notes'),
  ];

  for (const p of searchPaths) {
    if (fs.existsSync(p)) {
      return path.resolve(p);
    }
  }

  return path.resolve(process.cwd(), 'notes');
}
