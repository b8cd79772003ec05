import path from 'node:path';
import { fileURLToPath } from 'node:url';

const fixturesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../test/fixtures');

export function fixture(name: 'echo-worker' | 'slow-worker' | 'crash-worker' | 'error-worker' | 'partial-worker') {
    return path.join(fixturesDir, `${name}.mjs`);
}
