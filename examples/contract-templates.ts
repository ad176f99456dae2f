/**
 * Contract Templates Example
 *
 * This example demonstrates how to:
 * - Create a TemplateService with the built-in contract templates
 * - Load extra templates from YAML directories
 * - Customize copies without touching the registered masters
 */

import { TemplateService, isLogLevel } from '../packages/core/src/index.js';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: join(__dirname, '..', '.env') });

async function main() {
  const logLevel = process.env.LOG_LEVEL || 'info';
  const templatePaths = (process.env.TEMPLATE_PATHS || join(__dirname, 'templates'))
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);

  const service = new TemplateService({
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    templatePaths,
  });

  service.on('template:created', (name) => {
    service.getLogger().debug(`Copy handed out: ${name}`);
  });

  await service.loadTemplates();

  console.log('Creating 5 service contracts from the master...\n');

  for (let i = 1; i <= 5; i++) {
    const contract = service.create('service_contract');
    contract.title = `Contrato #${i} - Cliente ${i}`;
    contract.metadata.set('Cliente', `Cliente ${i}`);
    console.log(`  ${contract.title}`);
  }

  const master = service.create('service_contract');
  console.log(`\nMaster still has a Cliente entry: ${master.metadata.has('Cliente')}`);

  for (const summary of service.getRegistry().listSummaries()) {
    const template = service.create(summary.name);
    const description = service.describe(template);

    console.log(`\n=== ${description.title} (${summary.name}) ===`);
    console.log(`Category: ${description.category}`);
    console.log(`Sections: ${description.sectionCount}`);
    console.log(`Required fields: ${description.requiredFields.join(', ')}`);
    console.log(`Approvers: ${description.approvers.join(', ') || '-'}`);
  }
}

main().catch((error) => {
  console.error('Example failed:', error);
  process.exit(1);
});
