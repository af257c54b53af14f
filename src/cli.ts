/**
 * cart-multi-ship CLI
 * Runs the multiple shipping addresses scenario against a configured project
 */

import { loadConfig } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import { FileArtifactSink } from './pipeline/index.js';
import { runMultipleShippingAddressesScenario, sumTargets } from './scenarios/multiple-shipping-addresses.js';
import { CommerceService } from './services/index.js';

// ANSI colors for the final status line
const GREEN = '\x1b[0;32m';
const RED = '\x1b[0;31m';
const NO_COLOR = '\x1b[0m';

export const USAGE = `
cart-multi-ship - multiple shipping addresses on a cart

Usage:
  cart-multi-ship [run] [--out DIR] [--probe-quantity-policy]
  cart-multi-ship help

Options:
  --out DIR                  Folder for request and cart snapshots (default: CTP_OUTPUT_DIR or ./dynamic)
  --probe-quantity-policy    Finally reduce the line item quantity without its shipping details
                             and report whether the platform accepts it

Environment:
  CTP_AUTH_URL, CTP_API_URL, CTP_PROJECT_KEY, CTP_CLIENT_ID, CTP_CLIENT_SECRET (required)
  CTP_OUTPUT_DIR, CTP_TIMEOUT_MS, CTP_USER_AGENT (optional)
`;

function parseFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const val = args[idx + 1];
  if (val === undefined || val.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return val;
}

/**
 * `run` is the default command, so its flags may stand alone
 */
export function parseCommand(argv: string[]): { command: string | undefined; args: string[] } {
  const [first, ...rest] = argv;
  if (first === undefined || (first.startsWith('--') && first !== '--help')) {
    return { command: undefined, args: argv };
  }
  return { command: first, args: rest };
}

async function runScenarioCommand(args: string[]): Promise<void> {
  const out = parseFlag(args, '--out');
  const config = loadConfig();
  const outputDir = out ?? config.outputDir;

  const service = new CommerceService(config.client);
  const result = await runMultipleShippingAddressesScenario(service, {
    sink: new FileArtifactSink(outputDir),
    probeQuantityPolicy: args.includes('--probe-quantity-policy'),
    log: (message) => console.log(message),
    onStep: ({ name, handle }) => console.log(`  ✓ ${name} (cart ${handle.resourceId}, version ${handle.version})`),
  });

  const [item] = result.cart.lineItems;
  console.log(`\nProject: ${result.projectKey}`);
  console.log(`Product: ${result.catalog.productId}`);
  console.log(`Cart:    ${result.cart.id} (version ${result.cart.version})`);
  if (item) {
    console.log(`  Line item ${item.id}: ${item.quantity} units, ${sumTargets(item.shippingDetails)} allocated`);
  }

  if (result.probe?.outcome === 'rejected') {
    console.log(`Quantity-only reduction rejected (HTTP ${result.probe.status}): ${result.probe.message}`);
  } else if (result.probe?.outcome === 'accepted') {
    console.log(`Quantity-only reduction accepted, cart now at version ${result.probe.cart.version}`);
  }

  console.log(`Snapshots written to ${outputDir}`);
  console.log(`${GREEN}Completed scenarios successfully${NO_COLOR}`);
}

/**
 * Run one command and return the process exit code
 */
export async function runCommand(command: string | undefined, args: string[]): Promise<number> {
  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      console.log(USAGE);
      return 0;

    case undefined:
    case 'run':
      try {
        await runScenarioCommand(args);
        return 0;
      } catch (error) {
        console.error(`${RED}Error: ${describeError(error)}${NO_COLOR}`);
        if (error instanceof ConfigurationError && error.variables.length > 0) {
          console.error(`${RED}Check: ${error.variables.join(', ')}${NO_COLOR}`);
        }
        return 1;
      }

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run `cart-multi-ship help` for usage information.');
      return 1;
  }
}
