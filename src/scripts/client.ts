/**
 * API Client Demo
 * Layer: Entry Point (CLI, not HTTP)
 *
 * npm run client [-- --base-url http://localhost:3000]
 *
 * Walks the JSON API through one full lifecycle against a running server:
 * create a bank, list, move it to another city, list, delete it, list again.
 */
import { BankApiClient } from '@client/BankApiClient';
import { config } from '@core/config';
import type { Bank } from '@domain/entities/Bank';

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value ?? fallback;
}

// eslint-disable-next-line no-console
const log = console.log;

function printBanks(banks: Bank[]): void {
  log('Banks from API:');
  for (const bank of banks) {
    log(`- ${bank.id}: ${bank.name} (${bank.location})`);
  }
}

async function main(): Promise<void> {
  const client = new BankApiClient(getArg('--base-url', config.client.baseUrl));

  log('=== API Client Demo ===');

  const created = await client.create({ name: 'Demo Bank', location: 'Athens' });
  log('Created bank:', created);

  printBanks(await client.list());

  const updated = await client.update(created.id, { location: 'Thessaloniki' });
  log('Updated bank:', updated);

  printBanks(await client.list());

  await client.delete(created.id);
  log(`Deleted bank with id ${created.id}`);

  printBanks(await client.list());
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
