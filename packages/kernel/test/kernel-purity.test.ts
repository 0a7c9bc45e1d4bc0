/**
 * envshift Kernel: Kernel Purity Test
 *
 * Statically verifies that packages/kernel/src/ performs no I/O of its own:
 *   - no filesystem, subprocess, network or OS module imports
 *   - no reads of process.env
 *
 * The environment projector works against an EnvironmentDelta; the runtime
 * host is the only layer that touches the real process environment.
 *
 * Approach: read every .ts source under packages/kernel/src/ and scan for
 * forbidden patterns.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const kernelSrcDir = join(testDir, '..', 'src');

// ---------------------------------------------------------------------------
// Forbidden patterns
// ---------------------------------------------------------------------------

const FORBIDDEN_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'node:fs', pattern: /from ['"](node:)?fs(\/promises)?['"]/ },
  { label: 'node:child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'node:net', pattern: /from ['"](node:)?net['"]/ },
  { label: 'node:os', pattern: /from ['"](node:)?os['"]/ },
  { label: 'process.env', pattern: /process\.env/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('kernel package performs no I/O', () => {
  const sourceFiles = collectTsFiles(kernelSrcDir);

  it('kernel/src contains at least one .ts source file', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_PATTERNS)('no kernel source file uses $label', ({ label, pattern }) => {
    const violations: string[] = [];
    for (const file of sourceFiles) {
      if (pattern.test(readFileSync(file, 'utf-8'))) {
        violations.push(`  ${file.replace(kernelSrcDir + '/', '')} uses ${label}`);
      }
    }
    expect(violations, violations.join('\n')).toHaveLength(0);
  });
});
