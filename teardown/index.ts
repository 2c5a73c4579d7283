#!/usr/bin/env node
import { runTeardown } from './lib/teardown-cli';

const run = async () => {
    process.exitCode = await runTeardown({ ...process.env });
};

run().catch(error => {
    console.error('Teardown aborted:', error);
    process.exitCode = 1;
});
