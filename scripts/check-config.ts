/**
 * Check Gateway Configuration
 *
 * CLI tool that validates a configuration file the same way the
 * gateway does at startup and prints the resulting routing table.
 * API keys and account secrets are never printed.
 *
 * Usage: npm run check-config -- [path]
 * Example: npm run check-config -- ./config.json
 */

import { loadConfig } from '../src/config/gateway';
import { AccountRegistry } from '../src/utils/accounts';
import { ConfigError } from '../src/utils/errors';

function main() {
  const path = process.argv[2];
  const settings = loadConfig(path);
  const registry = new AccountRegistry(settings.accounts);

  console.log('\nAccounts:');
  for (const account of settings.accounts) {
    console.log(`  ${account.id}  ${account.endpoint_url} (${account.region})`);
    for (const bucket of account.buckets) {
      console.log(`    - ${bucket}`);
    }
  }

  console.log('\nUsers:');
  for (const { identity } of settings.identities) {
    const buckets = [...identity.allowed_buckets].join(', ');
    console.log(`  ${identity.username}  role=${identity.role}  buckets=${buckets}`);
  }

  console.log(`\nRoutable buckets: ${registry.size}`);
  console.log(`Max upload size:  ${settings.max_file_size} bytes`);
  console.log(
    `Rate limit:       ${settings.rate_limit.max_requests} requests / ${settings.rate_limit.window_seconds}s (${settings.rate_limit.store})`
  );
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Configuration invalid: ${err.message}`);
  } else {
    console.error('Error:', err);
  }
  process.exit(1);
}
