import fs from 'node:fs';
import path from 'node:path';
import { test } from '../testHarness';

type BoundaryRule = {
  layer: string;
  banned: string[];
};

type Violation = {
  file: string;
  specifier: string;
  reason: string;
};

const srcRoot = path.resolve(__dirname, '..', '..', 'src');

// Inner layers never reach outward; adapters and the runtime are wired in bootstrap only.
const rules: BoundaryRule[] = [
  { layer: 'domain', banned: ['@/application', '@/adapters', '@/ports', '@/runtime', '@/config'] },
  { layer: 'ports', banned: ['@/application', '@/adapters', '@/runtime'] },
  { layer: 'application', banned: ['@/adapters', '@/runtime', '@/config'] },
  { layer: 'shared', banned: ['@/application', '@/adapters', '@/runtime', '@/ports'] },
  { layer: 'adapters', banned: ['@/application', '@/runtime'] },
];

const importPattern = /(?:import|export)\s+(?:type\s+)?[^;]*?from\s+['"]([^'"]+)['"]/g;

function listTsFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) return listTsFiles(fullPath);
    return entry.isFile() && entry.name.endsWith('.ts') ? [fullPath] : [];
  });
}

function importsOf(content: string): string[] {
  return [...content.matchAll(importPattern)].map((match) => match[1]);
}

function violationsOf(rule: BoundaryRule): Violation[] {
  const violations: Violation[] = [];
  for (const file of listTsFiles(path.join(srcRoot, rule.layer))) {
    for (const specifier of importsOf(fs.readFileSync(file, 'utf8'))) {
      const banned = rule.banned.find((prefix) => specifier.startsWith(prefix));
      if (banned || specifier.startsWith('.')) {
        violations.push({
          file: path.relative(srcRoot, file),
          specifier,
          reason: banned ? `${rule.layer} must not import from ${banned}` : 'use the @/ alias',
        });
      }
    }
  }
  return violations;
}

test('architecture boundaries', () => {
  const violations = rules.flatMap(violationsOf);
  if (!violations.length) {
    return;
  }
  const details = violations
    .map((entry) => `- ${entry.file}: ${entry.reason} (${entry.specifier})`)
    .join('\n');
  throw new Error(`Import boundary violations:\n${details}`);
});
