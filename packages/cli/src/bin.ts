#!/usr/bin/env -S npx tsx
import { main } from './index';

void main().then((code) => {
  process.exitCode = code;
});
