#!/usr/bin/env -S node --import tsx
// src/cli/bin/docbranch.ts
// CLI bootstrap (executes the parser).
import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
