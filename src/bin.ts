#!/usr/bin/env node
/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import {run} from './cli.js';

process.exitCode = run(process.argv.slice(2));
