import { runCli } from "@/cli/runCli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Clause extraction failed", error);
    process.exitCode = 1;
  });
