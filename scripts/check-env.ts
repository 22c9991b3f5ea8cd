#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for framesift.
 * Checks the ffmpeg toolchain, the temp directory and optional S3 settings.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { accessSync, constants, mkdirSync } from 'fs';
import { env } from '../src/config.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, detail: string) =>
  console.log(`  ${YELLOW}-${RESET} ${label}  ${detail}`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkBinary(label: string, bin: string, hint: string): void {
  try {
    const out = execFileSync(bin, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    const firstLine = out.split('\n')[0] ?? '';
    pass(label, firstLine.slice(0, 60));
  } catch {
    fail(label, hint);
    anyRequiredFailed = true;
  }
}

// ── Section: Toolchain ────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== framesift — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] FFmpeg toolchain${RESET}`);

checkBinary('ffmpeg',  env.FFMPEG_PATH,  'Install ffmpeg or set FFMPEG_PATH');
checkBinary('ffprobe', env.FFPROBE_PATH, 'Install ffprobe or set FFPROBE_PATH');

// ── Section: Local storage ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Local storage${RESET}`);

try {
  mkdirSync(env.TEMP_DIR, { recursive: true });
  accessSync(env.TEMP_DIR, constants.W_OK);
  pass('TEMP_DIR writable', env.TEMP_DIR);
} catch {
  fail('TEMP_DIR writable', `Check permissions on ${env.TEMP_DIR} or set TEMP_DIR`);
  anyRequiredFailed = true;
}

// ── Section: Object storage (optional) ────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Object storage (optional)${RESET}`);

pass('AWS_REGION', env.AWS_REGION);
if (env.S3_ENDPOINT) {
  pass('S3_ENDPOINT', `${env.S3_ENDPOINT}${env.S3_FORCE_PATH_STYLE ? ' (path-style)' : ''}`);
} else {
  skip('S3_ENDPOINT', 'not set — using AWS default endpoints');
}
if (process.env['AWS_ACCESS_KEY_ID'] || process.env['AWS_PROFILE']) {
  pass('AWS credentials', process.env['AWS_PROFILE'] ? `profile ${process.env['AWS_PROFILE']}` : '(set)');
} else {
  skip('AWS credentials', 'none in env — s3:// inputs/outputs rely on the default provider chain');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log(anyRequiredFailed
  ? `\n${RED}✗ Required checks failed — fix the issues above before extracting${RESET}\n`
  : `\n${GREEN}✓ Ready to extract keyframes${RESET}\n`);

if (anyRequiredFailed) process.exit(1);
