#!/usr/bin/env node
import { createEasyIpCli } from "./cli/easyip-cli.js";

await createEasyIpCli().parseAsync(process.argv);
