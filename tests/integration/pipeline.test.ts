/**
 * End-to-end coverage pipeline tests.
 *
 * Exercises enumeration, extraction, aggregation, layer building and
 * writing against rule trees created in the temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join, relative } from 'node:path';

import { aggregateCoverage, generateCoverageLayer } from '@/pipeline.js';
import { NETWORK_VARIANT } from '@/config/variants.js';
import { mergeConfig } from '@/config/loader.js';
import { DEFAULT_CONFIG } from '@/config/defaults.js';
import { MalformedRuleError, NoInputError, NoTechniqueFoundWarning } from '@/utils/errors.js';
import { createRuleTree, makeTempDir, removeTree, ruleYaml } from '../helpers/rule-tree.js';

// ---------------------------------------------------------------------------
// Fixture helpers
// ---------------------------------------------------------------------------

const cleanup: string[] = [];
let outDir: string;

function tree(files: Record<string, string>): string {
  const root = createRuleTree(files);
  cleanup.push(root);
  return root;
}

beforeEach(() => {
  outDir = makeTempDir('techmap-out-');
  cleanup.push(outDir);
});

afterEach(() => {
  while (cleanup.length > 0) {
    const path = cleanup.pop();
    if (path) removeTree(path);
  }
});

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe('generateCoverageLayer', () => {
  it('scores every technique of a single Sev1 rule at 90', () => {
    const root = tree({
      'Okta/suspicious_login/rule.yml': 'Severity: Sev1\nMitreTechniques: ["T1059", "T1110.001"]\n',
    });
    const outputPath = join(outDir, 'out', 'layers', 'coverage_all.json');

    const result = generateCoverageLayer({ root, outputPath });

    expect(result.layer.name).toBe('Coverage - All');
    expect(result.layer.techniques).toEqual([
      {
        techniqueID: 'T1059',
        score: 90,
        comment: 'detections=1; max_sev=sev1; examples=suspicious_login/rule.yml',
        metadata: [
          { name: 'detections_count', value: '1' },
          { name: 'max_severity', value: 'sev1' },
        ],
      },
      {
        techniqueID: 'T1110.001',
        score: 90,
        comment: 'detections=1; max_sev=sev1; examples=suspicious_login/rule.yml',
        metadata: [
          { name: 'detections_count', value: '1' },
          { name: 'max_severity', value: 'sev1' },
        ],
      },
    ]);
    expect(result.stats).toEqual({ candidates: 1, parsed: 1, skipped: 0, techniques: 2 });
    expect(result.outputPath).toBe(outputPath);
    expect(JSON.parse(readFileSync(outputPath, 'utf-8'))).toEqual(result.layer);
  });

  it('falls back to free text and unknown severity', () => {
    const root = tree({
      'Windows/cred_dump/rule.yml':
        'title: LSASS access\ndescription: Matches T1003 behaviour, see T1003 and T1003.002\n',
    });

    const { summaries } = aggregateCoverage(root);

    expect([...summaries.keys()]).toEqual(['T1003', 'T1003.002']);
    expect(summaries.get('T1003')).toMatchObject({ bestScore: 50, bestSeverity: 'unknown', count: 1 });
    expect(summaries.get('T1003.002')).toMatchObject({ bestScore: 50, bestSeverity: 'unknown' });
  });

  it('keeps the highest severity across five rules', () => {
    const root = tree({
      'Windows/r1/rule.yml': ruleYaml('Sev4', ['T1059']),
      'Windows/r2/rule.yml': ruleYaml('Sev3', ['T1059']),
      'Windows/r3/rule.yml': ruleYaml('Sev2', ['T1059']),
      'Windows/r4/rule.yml': ruleYaml('Sev1', ['T1059']),
      'Windows/r5/rule.yml': ruleYaml('Sev0', ['T1059']),
    });

    const { layer } = generateCoverageLayer({ root, outputPath: join(outDir, 'layer.json') });

    expect(layer.techniques).toHaveLength(1);
    expect(layer.techniques[0].score).toBe(100);
    expect(layer.techniques[0].comment).toBe(
      'detections=5; max_sev=sev0; examples=r1/rule.yml, r2/rule.yml, r3/rule.yml, r4/rule.yml, r5/rule.yml',
    );
  });

  it('fails with NoInputError and writes nothing for an empty tree', () => {
    const root = tree({ 'docs/guide.yml': ruleYaml('Sev1', ['T1059']) });
    const outputPath = join(outDir, 'never', 'layer.json');

    expect(() => generateCoverageLayer({ root, outputPath })).toThrow(NoInputError);
    expect(existsSync(outputPath)).toBe(false);
    expect(existsSync(join(outDir, 'never'))).toBe(false);
  });

  it('restricts the network variant to allow-listed platforms', () => {
    const root = tree({
      'Cloudflare/ruleA/rule.yml': ruleYaml('Sev2', ['T1071.001']),
      'Okta/ruleB/rule.yml': ruleYaml('Sev1', ['T1110']),
    });

    const result = generateCoverageLayer({
      root,
      outputPath: join(outDir, 'network.json'),
      variant: NETWORK_VARIANT,
    });

    expect(result.layer.name).toBe('Coverage - Network');
    expect(result.layer.description).toBe(NETWORK_VARIANT.description);
    expect(result.layer.techniques.map((t) => t.techniqueID)).toEqual(['T1071.001']);
    expect(result.layer.techniques[0].comment).toBe('detections=1; max_sev=sev2; examples=ruleA/rule.yml');
  });

  it('reports the network message when no platform folder exists', () => {
    const root = tree({ 'Okta/ruleB/rule.yml': ruleYaml('Sev1', ['T1110']) });

    expect(() =>
      generateCoverageLayer({ root, outputPath: join(outDir, 'n.json'), variant: NETWORK_VARIANT }),
    ).toThrow(`No Network detection YAML files found under: ${root}`);
  });
});

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('pipeline properties', () => {
  const MIXED_TREE = {
    'Okta/login/rule.yml': ruleYaml('Sev2', ['T1110', 'T1078']),
    'Okta/notes/rule.yml': 'title: no mapping yet\n',
    'Okta/broken/rule.yml': 'Severity: [Sev0\n# maps to T1078.004\n',
    'Cloudflare/waf/rule.yaml': ruleYaml('sev0', ['T1190']),
  };

  it('produces byte-identical output on re-runs', () => {
    const root = tree(MIXED_TREE);
    const first = join(outDir, 'a.json');
    const second = join(outDir, 'b.json');

    generateCoverageLayer({ root, outputPath: first });
    generateCoverageLayer({ root, outputPath: second });

    expect(readFileSync(first, 'utf-8')).toBe(readFileSync(second, 'utf-8'));
  });

  it('accounts for every candidate file', () => {
    const root = tree(MIXED_TREE);

    const { stats, warnings } = aggregateCoverage(root);

    expect(stats).toEqual({ candidates: 4, parsed: 3, skipped: 1, techniques: 4 });
    expect(stats.parsed + stats.skipped).toBe(stats.candidates);
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toBeInstanceOf(MalformedRuleError);
    expect(warnings[0]).toMatchObject({ path: join(root, 'Okta/broken/rule.yml') });
    expect(warnings[1]).toBeInstanceOf(NoTechniqueFoundWarning);
    expect(warnings[1]).toMatchObject({ path: join(root, 'Okta/notes/rule.yml') });
  });

  it('emits techniques in strictly ascending order', () => {
    const root = tree(MIXED_TREE);

    const { layer } = generateCoverageLayer({ root, outputPath: join(outDir, 'sorted.json') });
    const ids = layer.techniques.map((t) => t.techniqueID);

    expect(ids).toEqual(['T1078', 'T1078.004', 'T1110', 'T1190']);
  });

  it('keeps only the first five examples in sorted file order', () => {
    const files: Record<string, string> = {};
    for (let i = 7; i >= 1; i--) {
      files[`Okta/rule${i}/a.yml`] = ruleYaml('Sev3', ['T1098']);
    }
    const root = tree(files);

    const { layer } = generateCoverageLayer({ root, outputPath: join(outDir, 'cap.json') });

    expect(layer.techniques[0].comment).toBe(
      'detections=7; max_sev=sev3; examples=rule1/a.yml, rule2/a.yml, rule3/a.yml, rule4/a.yml, rule5/a.yml',
    );
    expect(layer.techniques[0].metadata).toEqual([
      { name: 'detections_count', value: '7' },
      { name: 'max_severity', value: 'sev3' },
    ]);
  });

  it('scores a repeated severity key by its last value', () => {
    const root = tree({
      'Okta/dup/rule.yml': 'Severity: Sev0\nSeverity: Sev1\nMitreTechniques: T1078.004\n',
    });

    const { layer, warnings } = generateCoverageLayer({ root, outputPath: join(outDir, 'dup.json') });

    expect(warnings).toEqual([]);
    expect(layer.techniques).toEqual([
      {
        techniqueID: 'T1078.004',
        score: 90,
        comment: 'detections=1; max_sev=sev1; examples=dup/rule.yml',
        metadata: [
          { name: 'detections_count', value: '1' },
          { name: 'max_severity', value: 'sev1' },
        ],
      },
    ]);
  });

  it('reports the output path as it was given', () => {
    const root = tree({ 'Okta/login/rule.yml': ruleYaml('Sev2', ['T1110']) });
    const outputPath = relative(process.cwd(), join(outDir, 'nested', 'relative.json'));

    const result = generateCoverageLayer({ root, outputPath });

    expect(result.outputPath).toBe(outputPath);
    expect(existsSync(join(outDir, 'nested', 'relative.json'))).toBe(true);
  });

  it('honours configured field names', () => {
    const root = tree({
      'Okta/custom/rule.yml': 'level: Sev0\nattack_ids: [t1556]\ndescription: see T1110\n',
    });
    const config = mergeConfig(DEFAULT_CONFIG, {
      exclude: [],
      severityFields: ['level'],
      techniqueFields: ['attack_ids'],
    });

    const { summaries } = aggregateCoverage(root, { config });

    expect([...summaries.keys()]).toEqual(['T1556']);
    expect(summaries.get('T1556')).toMatchObject({ bestScore: 100, bestSeverity: 'sev0' });
  });
});
