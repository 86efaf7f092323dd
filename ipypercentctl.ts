#!/usr/bin/env -S node --import tsx

// Convert between .ipynb and percent-format .py based on the input extension.

import { PercentCLI } from "./lib/percent/cli.ts";

new PercentCLI().command().parse(process.argv);
