#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { EXIT_ERROR } from "./App";
import { main } from "./cli";
import { ConsoleLogger } from "./ConsoleLogger";

main(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    new ConsoleLogger().error("💥 Error during execution:", err);
    process.exitCode = EXIT_ERROR;
  });
