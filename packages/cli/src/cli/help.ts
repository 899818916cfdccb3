/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
protogate - HTTP gateway generator for gRPC services v${VERSION}

USAGE:
  protogate <command> [options]

COMMANDS:
  generate <descriptor.json>  Generate gateway sources from a descriptor set
  plugin                      Read a plugin request on stdin, write the response to stdout

GLOBAL OPTIONS:
  -h, --help                  Show help
  -v, --version               Show version
  -V, --verbose               Verbose output
  -q, --quiet                 Suppress output
  -c, --config <file>         Config file path (default: protogate.json)

GENERATE OPTIONS:
  -o, --out <dir>             Output directory (default: generated)
  --paths <mode>              Output layout: import or source_relative
  --module <prefix>           Strip this prefix from package paths (paths=import only)
  --standalone                Generate into a package separate from the messages
  --register-func-suffix <s>  Suffix of register functions (default: Handler)
  --no-request-context        Do not forward the request context to the client
  --no-patch-feature          Do not fill in update masks for PATCH bodies
  --omit-package-doc          Leave out the package documentation comment
  --import-prefix <prefix>    Prefix for derived package import paths

PLUGIN PARAMETERS:
  paths=, module=, standalone=, register_func_suffix=, request_context=,
  allow_patch_feature=, omit_package_doc=, import_prefix=, M<file>=<package>

EXAMPLES:
  protogate generate api.descriptor.json
  protogate generate api.descriptor.json --paths source_relative -o src/gen
  protogate generate api.descriptor.json --module example.com/gen --standalone
`);
};
