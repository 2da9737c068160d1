import path from 'path';

// Use process.cwd() for project root - works when running tests from project directory
const PROJECT_ROOT = process.cwd();
export const TMP_DIR = path.join(PROJECT_ROOT, '.tmp');
export const CONTENTS = 'var thing = true;\n';
// fixed so parsed headers are predictable
export const MTIME = 1700000000;
// checked-in archives for codecs the tests cannot produce in memory
export const DATA_DIR = path.join(PROJECT_ROOT, 'test', 'data');
