#!/usr/bin/env node
/**
 * Tether CLI バイナリエントリーポイント
 */
import { TetherCli } from './cli.js';

const cli = new TetherCli();
cli.run(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
