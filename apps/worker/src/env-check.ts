/**
 * Environment and tool diagnostics
 * Run with: npm run env:check
 */

import {
  initEnv,
  getEnvDiagnostics,
  loadIngestSettings,
  SETTINGS_ENV_KEYS,
  type IngestSettings,
} from '@objledger/config';
import { TOOL_NAMES, missingMandatoryTools, probeTools } from '@objledger/tools';

const { repoRoot, envFilePath, loaded, localLoaded } = initEnv();

console.log('🔍 objledger: Environment Diagnostics\n');
console.log(`   Node version: ${process.version}`);
console.log(`   CWD: ${process.cwd()}`);
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env loaded: ${loaded ? '✅' : '⚪'}`);
console.log(`   .env.local loaded: ${localLoaded ? '✅' : '⚪'}\n`);

const diagnostics = getEnvDiagnostics(SETTINGS_ENV_KEYS);

console.log('   Settings (unset keys use defaults):');
for (const key of diagnostics.keys) {
  if (key.present) {
    const source = key.source ? `, from ${key.source}` : '';
    console.log(`     ✅ ${key.key}=${key.value}${source}`);
  } else {
    console.log(`     ⚪ ${key.key}`);
  }
}

if (diagnostics.warnings.length > 0) {
  console.log('\n   ⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`     - ${warning}`);
  }
}

async function checkTools(): Promise<number> {
  let settings: IngestSettings;
  try {
    settings = loadIngestSettings();
  } catch (error) {
    console.log(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  console.log(`\n   Ingest root: ${settings.rootDir}`);
  console.log('   Tools:');
  const availability = await probeTools(settings.tools);
  for (const name of TOOL_NAMES) {
    console.log(`     ${availability[name] ? '✅' : '❌'} ${settings.tools[name]}`);
  }

  const missing = missingMandatoryTools(availability);
  if (missing.length > 0) {
    console.log(`\n❌ Missing required tools: ${missing.map((name) => settings.tools[name]).join(', ')}`);
    return 1;
  }

  console.log('\n✅ Settings are valid and the required tools are present');
  return 0;
}

checkTools().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('env check failed:', err);
    process.exit(1);
  }
);
