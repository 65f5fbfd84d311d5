#!/usr/bin/env tsx
import { mkProgram } from "../src/cli/program";

mkProgram().parse();
