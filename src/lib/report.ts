import type {
  AnalysisReport,
  LoadedImplementation,
  ObjectiveCatalogEntry,
  ObjectiveTemplateRecord,
  SampledObjective
} from '../types';

const HEADER_RULE = '='.repeat(60);
const MAX_BAR_LENGTH = 20;
const MAX_LISTED_FEATURES = 5;
const MAX_LISTED_CONSTRAINTS = 3;
const ROUND_LABEL_LENGTH = 30;
const FEATURE_RICHNESS_SCALE = 10;

export function formatHeader(implementation: LoadedImplementation): string[] {
  return [
    '',
    HEADER_RULE,
    `TESTING: ${implementation.gameName}`,
    `File: ${implementation.filePath}`,
    `Class: ${implementation.className}`,
    HEADER_RULE
  ];
}

export function formatAnalysis(report: AnalysisReport): string[] {
  const lines = [
    '',
    'IMPLEMENTATION ANALYSIS:',
    `   - Total Objectives: ${report.totalObjectives}`,
    `   - Complexity Score: ${report.complexityScore}`
  ];

  if (report.weightDistribution.size > 0) {
    lines.push('   - Weight Distribution:');
    const weights = [...report.weightDistribution.keys()].sort((a, b) => b - a);
    for (const weight of weights) {
      const count = report.weightDistribution.get(weight) ?? 0;
      const bar = '='.repeat(Math.min(count, MAX_BAR_LENGTH));
      lines.push(`     - Weight ${weight}: ${count} objectives ${bar}`);
    }
  }

  if (report.features.length > 0) {
    lines.push(`   - Features: ${report.features.slice(0, MAX_LISTED_FEATURES).join(', ')}`);
    if (report.features.length > MAX_LISTED_FEATURES) {
      lines.push(`     + ${report.features.length - MAX_LISTED_FEATURES} more...`);
    }
  }
  if (report.categories.length > 0) {
    lines.push(`   - Categories: ${report.categories.length} options available`);
  }
  if (report.dataSources.size > 0) {
    lines.push(`   - Data Sources: ${report.dataSources.size} unique types`);
  }
  if (report.specialMethods.length > 0) {
    lines.push(`   - Template Methods: ${report.specialMethods.join(', ')}`);
  }
  return lines;
}

export function weightIndicator(weight: number): string {
  if (weight >= 10) {
    return '[HIGH]';
  }
  if (weight >= 8) {
    return '[MED]';
  }
  if (weight >= 5) {
    return '[LOW]';
  }
  return '[MIN]';
}

export function formatSampleDetails(sample: SampledObjective): string {
  const difficulty = sample.isDifficult ? '[HARD]' : '[EASY]';
  const duration = sample.isTimeConsuming ? '[LONG]' : '[QUICK]';
  const complexity = sample.dataComplexity > 0 ? ` [DATA x${sample.dataComplexity}]` : '';
  return `      -> Weight: ${sample.weight} | ${difficulty} | ${duration}${complexity}`;
}

export function formatSamples(samples: readonly SampledObjective[]): string[] {
  const lines = ['', "DYNAMIC OBJECTIVE SELECTION (simulating the Keep's weighted selection):"];
  samples.forEach((sample, index) => {
    lines.push(`   ${index + 1}. ${weightIndicator(sample.weight)} ${sample.label}`);
    lines.push(formatSampleDetails(sample));
  });
  return lines;
}

export function formatRound(round: number, samples: readonly SampledObjective[]): string {
  const labels = samples.map((sample) => {
    const label =
      sample.label.length > ROUND_LABEL_LENGTH ? `${sample.label.slice(0, ROUND_LABEL_LENGTH)}...` : sample.label;
    return `W${sample.weight}:${label}`;
  });
  return `   Round ${round}: ${labels.join(' | ')}`;
}

export function formatConstraints(constraints: readonly ObjectiveTemplateRecord[]): string[] {
  if (constraints.length === 0) {
    return [];
  }
  const lines = ['', `CONSTRAINT SYSTEM: ${constraints.length} templates`];
  for (const constraint of constraints.slice(0, MAX_LISTED_CONSTRAINTS)) {
    lines.push(`   - ${constraint.label}`);
  }
  if (constraints.length > MAX_LISTED_CONSTRAINTS) {
    lines.push(`   ... and ${constraints.length - MAX_LISTED_CONSTRAINTS} more`);
  }
  return lines;
}

export function averageWeight(report: AnalysisReport): number {
  if (report.totalObjectives === 0) {
    return 0;
  }
  let total = 0;
  for (const [weight, count] of report.weightDistribution) {
    total += weight * count;
  }
  return total / report.totalObjectives;
}

export function formatMetrics(report: AnalysisReport): string[] {
  if (report.totalObjectives === 0) {
    return [];
  }
  return [
    '',
    'METRICS:',
    `   - Average Weight: ${averageWeight(report).toFixed(1)}`,
    `   - Feature Richness: ${report.features.length}/${FEATURE_RICHNESS_SCALE}`,
    `   - Customization: ${report.categories.length} options`
  ];
}

export function formatCatalog(entries: readonly ObjectiveCatalogEntry[]): string[] {
  const lines = ['', `OBJECTIVE CATALOG: ${entries.length} templates`];
  for (const entry of entries) {
    const flags = [entry.isDifficult ? 'difficult' : null, entry.isTimeConsuming ? 'time-consuming' : null]
      .filter((flag): flag is string => flag !== null)
      .join(', ');
    lines.push(`   - ${entry.label} (weight ${entry.weight}${flags ? `, ${flags}` : ''})`);
    for (const [placeholder, source] of Object.entries(entry.data)) {
      lines.push(`       ${placeholder} <- ${source}`);
    }
  }
  return lines;
}
