import path from "path";
import { parseArgs } from "../src/config/env";
import { errorMessage, InputError } from "../src/errors";
import { DatabaseHandle } from "../src/services/database-handle";
import { IpUtil } from "../src/services/ip-util";
import { projectRecord } from "../src/services/record-projection";

// Print usage information
function printUsage(): void {
  console.log("Usage: npm run inspect -- --file <path> [--ip <address>]");
  console.log("");
  console.log("Options:");
  console.log("  --file <path>     Database file (.mmdb) to inspect");
  console.log("  --ip <address>    Look up an IPv4 or IPv6 address");
  console.log("");
  console.log("Example:");
  console.log("  npm run inspect -- --file data/latest.mmdb --ip 8.8.8.8");
}

// Main function
async function main() {
  const argv = process.argv.slice(2);
  if (argv.includes("--help") || argv.includes("-h")) {
    printUsage();
    return;
  }

  const args = parseArgs(argv);
  if (!args.file) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const handle = await DatabaseHandle.open(path.resolve(args.file));
  const { metadata } = handle;

  console.log(`File:          ${handle.filePath}`);
  console.log(`Size:          ${handle.sizeBytes} bytes`);
  console.log(`Type:          ${metadata.databaseType ?? "(unknown)"}`);
  console.log(`Built:         ${new Date(metadata.buildEpoch * 1000).toISOString()}`);
  console.log(`Format:        ${metadata.binaryFormatMajorVersion}.${metadata.binaryFormatMinorVersion}`);
  console.log(`IP version:    ${metadata.ipVersion}`);
  console.log(`Record size:   ${metadata.recordSize} bits`);
  console.log(`Nodes:         ${metadata.nodeCount}`);
  console.log(`Languages:     ${metadata.languages.join(", ")}`);
  for (const [language, text] of Object.entries(metadata.description)) {
    console.log(`Description:   [${language}] ${text}`);
  }

  if (args.ip) {
    const address = IpUtil.parse(args.ip);
    if (!address) {
      throw new InputError(`Invalid IP address: ${args.ip}`);
    }

    const record = handle.lookup(address);
    console.log("");
    console.log(
      record
        ? JSON.stringify(projectRecord(address.text, record), null, 2)
        : `No data for ${address.text}`
    );
  }
}

main().catch((error) => {
  console.error("Inspection failed:", errorMessage(error));
  process.exit(1);
});
