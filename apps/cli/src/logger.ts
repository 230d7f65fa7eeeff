import bunyan from "bunyan";
import { isLogLevel } from "./config";

const envLevel = process.env.LOG_LEVEL ?? "";

// Logs go to stderr so that solved grids on stdout stay pipeable.
const log = bunyan.createLogger({
  name: "sudoprop-cli",
  level: isLogLevel(envLevel) ? envLevel : "warn",
  stream: process.stderr,
});

export default log;
