#!/usr/bin/env node
import { criarPrograma } from "./index.js";

await criarPrograma().parseAsync(process.argv);
