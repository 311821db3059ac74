import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { CliOptions } from '../run/run-options.dto';

// apps/cli/package.json sits two levels up from both src/cli and dist/cli
function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function buildProgram(action: (options: CliOptions) => Promise<void>): Command {
  return new Command('hostfan')
    .description('Run one local script on many SSH hosts in parallel; prints "<host>, <output>" per host.')
    .version(packageVersion())
    .option('--hosts <pattern>', "target hosts, brace patterns allowed, e.g. '{web,db}serv{01..50}'")
    .option('--script <file>', 'local script, fed to the remote shell on stdin')
    .option('--processes <n>', 'number of parallel workers')
    .option('--jumpbox <host>', 'route every connection through this jump host')
    .option('--connect-timeout <seconds>', 'ssh connect timeout (default 30)')
    .option('--command-timeout <seconds>', 'kill a session after this many seconds (default: never)')
    .addOption(new Option('--host-key-checking <mode>', 'ssh StrictHostKeyChecking').choices(['yes', 'accept-new', 'no']))
    .option('--user <name>', 'remote login name')
    .option('--port <n>', 'remote ssh port')
    .option('--identity <file>', 'private key to authenticate with')
    .option('--config <file>', 'YAML file with default settings')
    .option('--list-hosts', 'print the expanded host list and exit')
    .addOption(new Option('-q, --quiet', 'log errors only').conflicts('verbose'))
    .option('-v, --verbose', 'debug logging on stderr')
    .showHelpAfterError()
    .exitOverride()
    .action(async (options: CliOptions) => {
      await action(options);
    });
}
