import { Logger } from "@nestjs/common";

// Tests assert on logger calls through spies; keep the console quiet.
Logger.overrideLogger(false);
