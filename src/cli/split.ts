import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { applyLogging, preflight, resolveConfig, runMain, segmenterOptions } from './common';
import { splitAction } from './actions';

async function main() {
    const argv = await segmenterOptions(yargs(hideBin(process.argv)))
        .option('dry-run', {
            type: 'boolean',
            default: false,
            describe: 'Validate the titles file and print the plan without running ffmpeg',
        })
        .usage('$0 [options]\n\nSplit every video listed in the titles file into segments.')
        .help()
        .parse();

    const workDir = process.cwd();
    applyLogging(argv, workDir);
    const config = resolveConfig(argv, workDir);
    await preflight(config);
    await splitAction(config);
}

runMain(main);
