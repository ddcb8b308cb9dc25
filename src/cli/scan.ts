import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { applyLogging, preflight, resolveConfig, runMain, segmenterOptions } from './common';
import { generateAction } from './actions';

async function main() {
    const argv = await segmenterOptions(yargs(hideBin(process.argv)))
        .usage('$0 [options]\n\nWrite a titles file listing every video in the input directory.')
        .help()
        .parse();

    const workDir = process.cwd();
    applyLogging(argv, workDir);
    const config = resolveConfig(argv, workDir);
    await preflight(config);
    await generateAction(config);
}

runMain(main);
