import { setLogLevel } from "./logger.js";

setLogLevel("silent");
