import { readFile, writeFile } from "node:fs/promises";
import { pino } from "pino";
import { runCli } from "./cli.js";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

runCli(process.argv.slice(2), {
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: (path, contents) => writeFile(path, contents, "utf-8"),
  print: (text) => console.log(text),
  logger
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.fatal({ err: error }, "unexpected failure");
    process.exitCode = 1;
  });
