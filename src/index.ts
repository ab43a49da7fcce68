import { run } from "./app";
import { errorMessage } from "./errors";

run({
  argv: process.argv,
  host: { platform: process.platform, env: process.env },
  stdinIsTTY: Boolean(process.stdin.isTTY),
  stdoutIsTTY: Boolean(process.stdout.isTTY)
})
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
