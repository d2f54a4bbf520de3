import 'dotenv/config';

import { runCli } from './cli';

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
});
