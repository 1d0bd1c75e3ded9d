#!/usr/bin/env tsx
/**
 * verify-data.ts
 * Audits the reference data directory and writes a JSON report
 */

import fs from 'fs';
import path from 'path';
import config from '../config/index.js';
import { logger } from '../utils/logger.js';
import { auditReferenceData, countTables } from '../data/audit.js';
import { loadReferenceData } from '../data/loaders.js';

interface VerifyOptions {
  dataDir: string;
  reportDir: string;
}

function parseArgs(args: string[]): VerifyOptions {
  const options: VerifyOptions = {
    dataDir: config.paths.dataDir,
    reportDir: path.join(config.paths.logsDir, 'reports'),
  };
  for (const arg of args) {
    if (arg.startsWith('--data-dir=')) {
      options.dataDir = path.resolve(arg.slice('--data-dir='.length));
    } else if (arg.startsWith('--report-dir=')) {
      options.reportDir = path.resolve(arg.slice('--report-dir='.length));
    }
  }
  return options;
}

/** Returns the number of error findings. */
export function verify(options: VerifyOptions): number {
  logger.info(`Auditing reference data in ${options.dataDir}`);

  const data = loadReferenceData(options.dataDir);
  const counts = countTables(data);
  const findings = auditReferenceData(data);
  const errors = findings.filter((finding) => finding.severity === 'error');

  console.log('\n=== REFERENCE DATA ===');
  console.log(`Careers:          ${Object.entries(counts.careers).map(([r, n]) => `${r}=${n}`).join(', ')}`);
  console.log(`Role models:      ${Object.entries(counts.role_models).map(([r, n]) => `${r}=${n}`).join(', ')}`);
  console.log(`Personality types: ${counts.personality_types}`);
  console.log(`Tips:             ${counts.tips}`);
  console.log(`Reality checks:   ${counts.reality_checks}`);
  console.log(`Simulations:      ${counts.simulations}`);
  console.log(`Trending careers: ${Object.entries(counts.trending_careers).map(([r, n]) => `${r}=${n}`).join(', ')}`);

  if (findings.length > 0) {
    console.log('\n=== FINDINGS ===');
    for (const finding of findings) {
      console.log(`[${finding.severity.toUpperCase()}] ${finding.table}: ${finding.message}`);
    }
  }

  if (!fs.existsSync(options.reportDir)) {
    fs.mkdirSync(options.reportDir, { recursive: true });
  }
  const reportFile = path.join(options.reportDir, `data-audit-${new Date().toISOString().split('T')[0]}.json`);
  fs.writeFileSync(
    reportFile,
    JSON.stringify({ timestamp: new Date().toISOString(), dataDir: options.dataDir, counts, findings }, null, 2)
  );
  logger.info(`Report saved to: ${reportFile}`);

  return errors.length;
}

function main(): void {
  const errors = verify(parseArgs(process.argv.slice(2)));
  if (errors > 0) {
    logger.error(`❌ Reference data has ${errors} error(s)`);
    process.exit(1);
  }
  logger.info('✅ Reference data verified');
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    main();
  } catch (error) {
    logger.error('Script failed:', error);
    process.exit(1);
  }
}
