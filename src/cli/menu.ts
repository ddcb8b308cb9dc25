/* eslint-disable no-console */
import inquirer from 'inquirer';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { errorMessage, isFatal } from '../pipeline/errors';
import { warn } from '../pipeline/log';
import type { SegmenterConfig } from '../pipeline/types';
import { generateAction, splitAction } from './actions';
import { applyLogging, preflight, resolveConfig, runMain, segmenterOptions } from './common';

type MenuAction = 'generate' | 'split' | 'exit';

function printHeader(config: SegmenterConfig) {
    console.log('\n' + '='.repeat(60));
    console.log('Video Segmenter');
    console.log('='.repeat(60));
    console.log(`Input directory: ${config.inputDir}`);
    console.log(`Split directory: ${config.splitDir}`);
    console.log(`Completed directory: ${config.completedDir}`);
    console.log(`Titles file: ${config.manifestPath}`);
    console.log(`Segment length: ${config.segmentMinutes} minutes`);
    console.log(`Folder per split: ${config.folderPerSplit}`);
    console.log('='.repeat(60));
}

async function ask(): Promise<MenuAction> {
    const { action } = await inquirer.prompt<{ action: MenuAction }>([
        {
            type: 'list',
            name: 'action',
            message: 'Select an option',
            choices: [
                { name: '1. Generate titles file', value: 'generate' },
                { name: '2. Split videos into segments', value: 'split' },
                { name: '3. Exit', value: 'exit' },
            ],
        },
    ]);
    return action;
}

async function main() {
    const argv = await segmenterOptions(yargs(hideBin(process.argv)))
        .usage('$0 [options]\n\nInteractive menu: generate the titles file, then split.')
        .help()
        .parse();

    const workDir = process.cwd();
    applyLogging(argv, workDir);
    const config = resolveConfig(argv, workDir);
    await preflight(config);

    for (;;) {
        printHeader(config);
        const action = await ask();
        if (action === 'exit') {
            console.log('\nExiting...');
            return;
        }
        try {
            if (action === 'generate') {
                await generateAction(config);
            } else {
                await splitAction(config);
            }
        } catch (e) {
            // Missing/invalid titles file: report and show the menu again
            if (isFatal(e)) throw e;
            warn('menu.action.fail', { action, error: errorMessage(e) });
            console.error(`\n✗ Error: ${errorMessage(e)}`);
        }
    }
}

runMain(main);
