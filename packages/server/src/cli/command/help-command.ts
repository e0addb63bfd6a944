export function printHelp() {
    console.log(`
Usage:
  serve [--port 8000] [--host 0.0.0.0] [--config ecoscore.config.json] [--log-level info]
  assess --product "<name>" --material <id[=share]> [--material ...] --weight <kg>
         --origin <country> --destination <country> [--mode sea] [--json] [-v]
  methodology
  help

Options:
  --port <port>          HTTP port (env: PORT, default: 8000)
  --host <host>          Bind address (env: HOST, default: 0.0.0.0)
  --config <file>        JSON config file (default: ./ecoscore.config.json when present)
  --log-level <level>    fatal|error|warn|info|debug|trace|silent (env: LOG_LEVEL)

  --product <name>       Product name
  --material <id=share>  Material share, repeat for blends; shares must sum to 1.0
  --weight <kg>          Product weight in kilograms (> 0)
  --origin <country>     Production country (ISO code or name)
  --destination <c>      Delivery country (ISO code or name)
  --mode <mode>          sea|rail|road|air (default: sea)

  --json                 Print JSON output (machine-readable)
  -v / --verbose         More info (config sources, explanation)
  -vv                    Adds engine debug logs

Environment:
  ECOSCORE_API_KEYS      Comma separated API keys accepted by the server
  RATE_LIMIT_MAX         Requests per key per window (default: 5)
  RATE_LIMIT_WINDOW_MS   Window length in ms (default: 1000)
`);
}
