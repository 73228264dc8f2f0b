import { Logger } from "pushline-kernel";

// Keep test output quiet and avoid spawning the pino-pretty worker.
Logger.configure({ level: "silent", prettyPrint: false, replace: true });
