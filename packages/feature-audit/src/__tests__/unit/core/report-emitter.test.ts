/**
 * Report Emitter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import {
  REPORT_FILE_NAMES,
  formatSummary,
  renderReports,
  summarizeAudit,
  writeReports,
  type ReportName,
} from '../../../core/report-emitter.js';
import type { AuditResult, CoverageEntry } from '../../../core/types.js';
import { escapeCsv, formatCsv, formatPercent } from '../../../core/utils/csv.js';
import {
  createRecordingLogger,
  createTempWorkspace,
  type TempWorkspace,
} from '../../utils/fixtures.js';

function sampleResult(): AuditResult {
  return {
    features: {
      rawFeatures: ['age', 'gender', 'sex', 'race'],
      mappedFeatures: ['age_at_index', 'sex', 'race'],
      mapping: new Map([
        ['age', 'age_at_index'],
        ['gender', 'sex'],
        ['sex', 'sex'],
        ['race', 'race'],
      ]),
    },
    catalog: new Map([
      ['cases.tsv', ['case_id', 'sex']],
      ['samples.tsv', ['sample_id', 'sex', 'age_at_index']],
    ]),
    existence: {
      records: new Map([
        ['age_at_index', { exists: true, files: ['samples.tsv'] }],
        ['sex', { exists: true, files: ['cases.tsv', 'samples.tsv'] }],
        ['race', { exists: false, files: [] }],
      ]),
      existing: ['age_at_index', 'sex'],
      missing: ['race'],
    },
    coverage: {
      coverage: new Map<string, ReadonlyMap<string, CoverageEntry>>([
        ['case_id', new Map([['cases.tsv', { coverage: 1, isCritical: false }]])],
        [
          'sex',
          new Map([
            ['cases.tsv', { coverage: 0.5, isCritical: true }],
            ['samples.tsv', { coverage: 1, isCritical: true }],
          ]),
        ],
        ['sample_id', new Map([['samples.tsv', { coverage: 1, isCritical: false }]])],
        ['age_at_index', new Map([['samples.tsv', { coverage: 2 / 3, isCritical: true }]])],
      ]),
      criticalCoverage: new Map([
        [
          'sex',
          new Map([
            ['cases.tsv', { coverage: 0.5, nonMissingCount: 1, totalCount: 2 }],
            ['samples.tsv', { coverage: 1, nonMissingCount: 3, totalCount: 3 }],
          ]),
        ],
        [
          'age_at_index',
          new Map([['samples.tsv', { coverage: 2 / 3, nonMissingCount: 2, totalCount: 3 }]]),
        ],
      ]),
    },
  };
}

function reportContent(result: AuditResult, name: ReportName): string {
  const report = renderReports(result).find((file) => file.name === name);
  if (!report) throw new Error(`report ${name} not rendered`);
  return report.content;
}

describe('csv helpers', () => {
  it('should quote only fields that need it', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('a, b')).toBe('"a, b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsv(42)).toBe('42');
  });

  it('should end every row with CRLF', () => {
    expect(formatCsv(['A', 'B'], [['1', 2]])).toBe('A,B\r\n1,2\r\n');
    expect(formatCsv(['Only'], [])).toBe('Only\r\n');
  });

  it('should format ratios as percentages with two decimals', () => {
    expect(formatPercent(0.8)).toBe('80.00%');
    expect(formatPercent(1)).toBe('100.00%');
    expect(formatPercent(0)).toBe('0.00%');
    expect(formatPercent(2 / 3)).toBe('66.67%');
  });

  it('should round an exact tie to the even digit', () => {
    expect(formatPercent(1 / 800)).toBe('0.12%');
    expect(formatPercent(0.125)).toBe('12.50%');
    expect(formatPercent(3 / 8000)).toBe('0.04%');
  });
});

describe('renderReports', () => {
  it('should render the six reports in order', () => {
    expect(renderReports(sampleResult()).map((file) => file.fileName)).toEqual([
      'critical_features.csv',
      'nodes_features.csv',
      'feature_existence.csv',
      'feature_coverage.csv',
      'missing_critical_features.csv',
      'critical_features_coverage.csv',
    ]);
  });

  it('should render the critical feature mapping', () => {
    expect(reportContent(sampleResult(), 'criticalFeatures')).toBe(
      [
        'Original Feature Name,Mapped Feature Name',
        'age,age_at_index',
        'gender,sex',
        'sex,sex',
        'race,race',
        '',
      ].join('\r\n')
    );
  });

  it('should render one catalog row per file column', () => {
    expect(reportContent(sampleResult(), 'nodesFeatures')).toBe(
      [
        'File Name,Feature Name',
        'cases.tsv,case_id',
        'cases.tsv,sex',
        'samples.tsv,sample_id',
        'samples.tsv,sex',
        'samples.tsv,age_at_index',
        '',
      ].join('\r\n')
    );
  });

  it('should quote the joined file list in the existence report', () => {
    expect(reportContent(sampleResult(), 'featureExistence')).toBe(
      [
        'Feature Name,Exists,Files',
        'age_at_index,y,samples.tsv',
        'sex,y,"cases.tsv, samples.tsv"',
        'race,n,',
        '',
      ].join('\r\n')
    );
  });

  it('should render coverage as percentages', () => {
    expect(reportContent(sampleResult(), 'featureCoverage')).toBe(
      [
        'Feature Name,File Name,Coverage,Is Critical Feature',
        'case_id,cases.tsv,100.00%,No',
        'sex,cases.tsv,50.00%,Yes',
        'sex,samples.tsv,100.00%,Yes',
        'sample_id,samples.tsv,100.00%,No',
        'age_at_index,samples.tsv,66.67%,Yes',
        '',
      ].join('\r\n')
    );
  });

  it('should list missing critical features', () => {
    expect(reportContent(sampleResult(), 'missingCriticalFeatures')).toBe(
      'Missing Critical Feature\r\nrace\r\n'
    );
  });

  it('should render critical coverage with raw counts', () => {
    expect(reportContent(sampleResult(), 'criticalFeaturesCoverage')).toBe(
      [
        'Critical Feature,File Name,Coverage,Non-Null Count,Total Count',
        'sex,cases.tsv,50.00%,1,2',
        'sex,samples.tsv,100.00%,3,3',
        'age_at_index,samples.tsv,66.67%,2,3',
        '',
      ].join('\r\n')
    );
  });
});

describe('summarizeAudit', () => {
  it('should count features and columns', () => {
    const summary = summarizeAudit(sampleResult(), 0.8);

    expect(summary).toEqual({
      rawFeatureCount: 4,
      mappedFeatureCount: 3,
      distinctColumnCount: 4,
      missingFeatureCount: 1,
      existingFeatureCount: 2,
      threshold: 0.8,
      featuresMeetingThreshold: 0,
    });
  });

  it('should compare mean coverage across files with the threshold', () => {
    // sex averages 0.75, age_at_index 0.667
    expect(summarizeAudit(sampleResult(), 0.75).featuresMeetingThreshold).toBe(1);
    expect(summarizeAudit(sampleResult(), 0.6).featuresMeetingThreshold).toBe(2);
    expect(summarizeAudit(sampleResult(), 0.76).featuresMeetingThreshold).toBe(0);
  });
});

describe('formatSummary', () => {
  it('should render the fixed-format summary', () => {
    const rule = '='.repeat(80);

    expect(formatSummary(summarizeAudit(sampleResult(), 0.8))).toBe(
      [
        '',
        rule,
        'DATA FEATURE ANALYSIS SUMMARY',
        rule,
        '1. Original critical features extracted: 4',
        '2. Unique mapped critical features: 3',
        '3. Total features in data files: 4',
        '4. Critical features missing from data: 1',
        '5. Critical features present in data: 2',
        '6. Critical features with coverage >= 80.00%: 0',
        rule,
        '',
      ].join('\n')
    );
  });
});

describe('writeReports', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should write every report into a new output directory', async () => {
    const outputDir = workspace.path('reports', 'run-1');

    const written = await writeReports(sampleResult(), outputDir, createRecordingLogger());

    expect(written.failed).toEqual([]);
    expect(written.written).toHaveLength(6);
    await expect(
      readFile(workspace.path('reports', 'run-1', REPORT_FILE_NAMES.missingCriticalFeatures), 'utf-8')
    ).resolves.toBe('Missing Critical Feature\r\nrace\r\n');
  });

  it('should write byte-identical reports for the same result', async () => {
    await writeReports(sampleResult(), workspace.path('first'), createRecordingLogger());
    await writeReports(sampleResult(), workspace.path('second'), createRecordingLogger());

    for (const fileName of Object.values(REPORT_FILE_NAMES)) {
      const first = await readFile(workspace.path('first', fileName));
      const second = await readFile(workspace.path('second', fileName));
      expect(first.equals(second)).toBe(true);
    }
  });

  it('should log a failed report and still write the others', async () => {
    // A file where the output directory should be makes every write fail
    await writeFile(workspace.path('blocked'), 'not a directory');
    const log = createRecordingLogger();

    const written = await writeReports(sampleResult(), workspace.path('blocked'), log);

    expect(written.written).toEqual([]);
    expect(written.failed).toHaveLength(6);
    expect(log.messages('error')).toHaveLength(6);
    expect(log.messages('error')[0]).toBe('Error writing report critical_features.csv');
  });
});
