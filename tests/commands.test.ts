import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { main } from '../src/cli';
import { ValidationError } from '../src/errors';
import ReferenceManagerApp, { loadSettings, resolveConfigPath } from '../src/main';
import { runCommand } from '../src/setup';
import { DEFAULT_SETTINGS } from '../src/types/settings';
import { makeTempDir, removeTempDir } from './helpers';

const SAMPLE_BIB = `@article{smith2020,
  author = {Smith, J. and Doe, A.},
  title = {Deep Learning},
  year = {2020},
  journal = {AI Journal},
  volume = {5},
  pages = {1--10},
}
`;

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should use the defaults when there is no settings file', async () => {
    expect(await loadSettings(join(dir, 'missing.json'))).toEqual(DEFAULT_SETTINGS);
  });

  it('should override only the keys the file names', async () => {
    const configPath = join(dir, 'refman.config.json');
    await writeFile(configPath, JSON.stringify({ baseDir: 'library', defaultCitationStyle: 'citep' }));

    expect(await loadSettings(configPath)).toEqual({
      ...DEFAULT_SETTINGS,
      baseDir: 'library',
      defaultCitationStyle: 'citep',
    });
  });

  it('should reject invalid values and unknown keys', async () => {
    const badStyle = join(dir, 'bad-style.json');
    const unknownKey = join(dir, 'unknown-key.json');
    await writeFile(badStyle, JSON.stringify({ defaultCitationStyle: 'parencite' }));
    await writeFile(unknownKey, JSON.stringify({ colour: 'blue' }));

    await expect(loadSettings(badStyle)).rejects.toThrow(`Invalid settings in ${badStyle}: defaultCitationStyle`);
    await expect(loadSettings(unknownKey)).rejects.toThrow(ValidationError);
  });

  it("should reject a file that isn't JSON", async () => {
    const configPath = join(dir, 'broken.json');
    await writeFile(configPath, 'baseDir = library');

    await expect(loadSettings(configPath)).rejects.toThrow(ValidationError);
  });

  it('should prefer an explicit config path over the environment', () => {
    const previous = process.env.REFMAN_CONFIG;
    process.env.REFMAN_CONFIG = 'from-env.json';

    expect(resolveConfigPath('explicit.json')).toBe('explicit.json');
    expect(resolveConfigPath()).toBe('from-env.json');

    if (previous === undefined) {
      delete process.env.REFMAN_CONFIG;
    } else {
      process.env.REFMAN_CONFIG = previous;
    }
  });
});

describe('runCommand', () => {
  let dir: string;
  let app: ReferenceManagerApp;
  let messages: string[];
  const notify = (message: string) => {
    messages.push(message);
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    app = new ReferenceManagerApp({ ...DEFAULT_SETTINGS, baseDir: join(dir, 'references') });
    messages = [];
    await writeFile(join(dir, 'sample.bib'), SAMPLE_BIB);
    await runCommand(app, 'create-project', ['thesis'], {}, notify);
    await runCommand(app, 'import', ['thesis', join(dir, 'sample.bib')], {}, notify);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should report project creation and import', () => {
    expect(messages).toEqual(['Created project thesis', 'Imported 1 references into thesis']);
  });

  it('should list renamed keys on a repeated import', async () => {
    messages = [];

    await runCommand(app, 'import', ['thesis', join(dir, 'sample.bib')], {}, notify);

    expect(messages).toEqual(['Imported 1 references into thesis', '  smith2020 -> smith2020_1']);
  });

  it('should print a citation in the requested style', async () => {
    messages = [];

    await runCommand(app, 'cite', ['thesis', 'smith2020'], { style: 'citep' }, notify);
    await runCommand(app, 'cite', ['thesis', 'smith2020'], {}, notify);

    expect(messages).toEqual(['\\citep{smith2020}', '\\cite{smith2020}']);
  });

  it('should show a reference', async () => {
    messages = [];

    await runCommand(app, 'show', ['thesis', 'smith2020'], {}, notify);

    expect(messages.slice(0, 3)).toEqual([
      'Smith, J., Doe, A.. (2020). Deep Learning. AI Journal, 5, 1--10.',
      'Smith and Doe (2020)',
      'File: Smith_2020_Deep_Learning.pdf (not attached)',
    ]);
    expect(messages[3]).toMatch(/^@article\{smith2020,\n/);
  });

  it('should export, list and delete projects', async () => {
    const output = join(dir, 'out.bib');
    messages = [];

    await runCommand(app, 'export', ['thesis', output], {}, notify);
    await runCommand(app, 'list-projects', [], {}, notify);
    await runCommand(app, 'delete-project', ['thesis'], {}, notify);

    expect(messages).toEqual([
      `Bibliography exported to ${output} (bibtex)`,
      'thesis',
      'Deleted project thesis',
    ]);
    expect(await readFile(output, 'utf8')).toContain('@article{smith2020,');
    await expect(runCommand(app, 'delete-project', ['thesis'], {}, notify)).rejects.toThrow(
      'Project not found: thesis'
    );
  });

  it('should export to the default bibliography file without an output path', async () => {
    const output = join(dir, 'references', 'thesis', 'bibliography.bib');
    messages = [];

    await runCommand(app, 'export', ['thesis'], {}, notify);

    expect(messages).toEqual([`Bibliography exported to ${output} (bibtex)`]);
    expect(await readFile(output, 'utf8')).toContain('@article{smith2020,');
  });

  it('should write the effective settings to the config file', async () => {
    const configPath = join(dir, 'saved.config.json');
    messages = [];

    await runCommand(app, 'init-config', [], { config: configPath }, notify);

    expect(messages).toEqual([`Settings written to ${configPath}`]);
    expect(await loadSettings(configPath)).toEqual(app.settings);
  });

  it('should attach and remove references', async () => {
    const pdf = join(dir, 'paper.pdf');
    await writeFile(pdf, 'pdf bytes');
    const attachedPath = join(dir, 'references', 'thesis', 'Smith_2020_Deep_Learning.pdf');
    messages = [];

    await runCommand(app, 'attach', ['thesis', 'smith2020', pdf], {}, notify);
    await runCommand(app, 'remove', ['thesis', 'smith2020'], {}, notify);

    expect(messages).toEqual([`Attached ${pdf} as ${attachedPath}`, 'Removed smith2020 from thesis']);
    expect(await readFile(attachedPath, 'utf8')).toBe('pdf bytes');
  });

  it('should merge files', async () => {
    const output = join(dir, 'merged.bib');
    messages = [];

    await runCommand(app, 'merge', [output, join(dir, 'sample.bib'), join(dir, 'sample.bib')], {}, notify);

    expect(messages).toEqual([`Merged 2 files (2 entries) into ${output}`]);
  });

  it('should reject unknown commands and missing arguments', async () => {
    await expect(runCommand(app, 'frobnicate', [], {}, notify)).rejects.toThrow('Unknown command: frobnicate');
    await expect(runCommand(app, 'import', ['thesis'], {}, notify)).rejects.toThrow(
      'Usage: refman import <project> <file.bib>'
    );
  });
});

describe('main', () => {
  let dir: string;
  let configPath: string;
  let messages: string[];
  const notify = (message: string) => {
    messages.push(message);
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = join(dir, 'refman.config.json');
    await writeFile(configPath, JSON.stringify({ baseDir: join(dir, 'references') }));
    messages = [];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should print usage for --help', async () => {
    expect(await main(['--help'], notify)).toBe(0);
    expect(messages[0]).toMatch(/^Usage: refman <command>/);
  });

  it('should fail without a command', async () => {
    expect(await main([], notify)).toBe(1);
  });

  it('should run a command with the given config', async () => {
    expect(await main(['--config', configPath, 'create-project', 'thesis'], notify)).toBe(0);
    expect(messages).toEqual(['Created project thesis']);
  });

  it('should report errors and return a failure code', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await main(['--config', configPath, 'export', 'thesis', 'out.bib', '--format', 'xml'], notify)).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: Unknown format: xml');
    errorSpy.mockRestore();
  });
});
