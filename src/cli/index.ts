#!/usr/bin/env tsx

/**
 * CLI entry point for the TeX to Kindle converter
 * Handles command-line argument parsing and user interaction
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
