#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "@basis-desk/shared";
import { createBacktestProgram } from "./cli.js";

createBacktestProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        console.error(errorMessage(error));
        process.exitCode = 1;
    });
