import { Command, CommanderError } from 'commander';
import { runAll, runStage, STAGES, type PipelineOptions, type StageResult } from './pipeline.js';

interface StageCliOptions {
    dir?: string;
    rules?: string;
    allowReuse?: boolean;
    robots: boolean;
}

export interface ProgramOutput {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

const processOutput: ProgramOutput = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
};

const STAGE_DESCRIPTIONS: Record<(typeof STAGES)[number], string> = {
    scrape: 'Scrape the API and demo pages into <component>_full_details.json',
    csharp: 'Generate GeneratedCSharp/Mui<Component>.cs from the scraped JSON',
    uxml: 'Generate one GeneratedUXML/*.uxml document per variation',
    uss: 'Generate GeneratedUSS/<component>_styles.uss',
};

function toPipelineOptions(options: StageCliOptions): PipelineOptions {
    return {
        dir: options.dir,
        rulesFile: options.rules,
        exclusiveClaims: !options.allowReuse,
        respectRobots: options.robots,
    };
}

function withStageOptions(command: Command): Command {
    return command
        .argument('<component>', 'Component name, e.g. Button')
        .option('--dir <path>', 'Working directory for the JSON file and generated output')
        .option('--rules <file>', 'Extra inference rules merged over the bundled table')
        .option('--allow-reuse', 'Let one rendered element match several snippets')
        .option('--no-robots', 'Do not read robots.txt before fetching');
}

/**
 * Builds the CLI. Commander errors are thrown as CommanderError instead of
 * exiting the process. `exitCode` collects the status of the stages it ran: 1 when
 * any stage failed, 0 otherwise (a missing JSON file is not a failure).
 */
export function createProgram(output: ProgramOutput = processOutput): { program: Command; exitCode: () => number } {
    let exitCode = 0;
    const report = (results: StageResult[]): void => {
        for (const result of results) {
            if (result.output) output.stdout(result.output.endsWith('\n') ? result.output : result.output + '\n');
            if (result.status === 'failed') exitCode = 1;
        }
    };

    const program = new Command()
        .name('docs2uitk')
        .description('Turn component documentation pages into Unity UI Toolkit C#, UXML and USS')
        .version('1.0.0')
        .configureOutput({
            writeOut: str => output.stdout(str),
            writeErr: str => output.stderr(str),
        })
        .showHelpAfterError()
        .showSuggestionAfterError(true)
        .exitOverride();

    for (const stage of STAGES) {
        withStageOptions(program.command(stage))
            .description(STAGE_DESCRIPTIONS[stage])
            .action(async (component: string, options: StageCliOptions) => {
                report([await runStage(stage, component, toPipelineOptions(options))]);
            });
    }

    withStageOptions(program.command('all'))
        .description('Run scrape, csharp, uxml and uss in order')
        .action(async (component: string, options: StageCliOptions) => {
            report(await runAll(component, toPipelineOptions(options)));
        });

    return { program, exitCode: () => exitCode };
}

/** Parses `argv` (node-style, script path included) and returns the exit status. */
export async function runCli(argv: readonly string[], output: ProgramOutput = processOutput): Promise<number> {
    const { program, exitCode } = createProgram(output);
    try {
        await program.parseAsync([...argv]);
    } catch (err) {
        if (err instanceof CommanderError) {
            return err.exitCode;
        }
        throw err;
    }
    return exitCode();
}
