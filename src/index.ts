#!/usr/bin/env tsx
import { program } from "./cli/index";

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
