import { fileURLToPath } from 'url';

// Files shipped in the package's data/ folder.  This module sits one level below the
// package root both as source (src/) and as bundle (dist/), so the relative URL holds for both.

export const UNIT_CUBE_PATH = fileURLToPath(new URL('../data/B.stl', import.meta.url));
