#!/usr/bin/env node

/**
 * mediactl CLI
 *
 * Command-line controller for media players.
 *
 * Commands:
 * - play / pause / play-pause / stop / next / previous: playback control
 * - position / volume: print or change the playback position and volume
 * - status / metadata: print player state, optionally through --format
 * - open: open a file or URL in the player
 */

import { runCli } from './run.js';

process.exitCode = await runCli(process.argv.slice(2));
