import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { IOError } from '../src/errors';
import { FileManager } from '../src/fileManager';
import { Project, createReference } from '../src/models';
import { makeTempDir, removeTempDir } from './helpers';

describe('FileManager', () => {
  let dir: string;
  let fileManager: FileManager;

  beforeEach(async () => {
    dir = await makeTempDir();
    fileManager = new FileManager(join(dir, 'references'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should save and load a project with all reference details', async () => {
    const project = new Project('thesis', [
      createReference('smith2020', 'article', { title: 'Deep Learning', year: '2020' }),
      createReference(
        'smith2020_1',
        'article',
        { title: 'Deep Learning' },
        { originalKey: 'smith2020', filePath: '/tmp/Smith_2020_Deep_Learning.pdf' }
      ),
    ]);

    await fileManager.saveProject(project);
    const loaded = await fileManager.loadProject('thesis');

    expect(loaded?.name).toBe('thesis');
    expect(loaded?.getAllReferences()).toEqual(project.getAllReferences());
  });

  it('should write the project file as JSON keyed by citation key', async () => {
    await fileManager.saveProject(new Project('thesis', [createReference('k', 'misc', { title: 'T' })]));

    const stored: unknown = JSON.parse(await readFile(join(dir, 'references', 'thesis', 'project.json'), 'utf8'));

    expect(stored).toEqual({
      name: 'thesis',
      references: { k: { key: 'k', entryType: 'misc', fields: { title: 'T' } } },
    });
  });

  it("should return null for a project that doesn't exist", async () => {
    expect(await fileManager.loadProject('missing')).toBeNull();
  });

  it('should list saved projects in sorted order', async () => {
    expect(await fileManager.listProjects()).toEqual([]);

    await fileManager.saveProject(new Project('beta'));
    await fileManager.saveProject(new Project('alpha'));

    expect(await fileManager.listProjects()).toEqual(['alpha', 'beta']);
  });

  it('should delete a project and update the list', async () => {
    await fileManager.saveProject(new Project('alpha'));
    await fileManager.saveProject(new Project('beta'));

    expect(await fileManager.deleteProject('alpha')).toBe(true);
    expect(await fileManager.deleteProject('alpha')).toBe(false);
    expect(await fileManager.listProjects()).toEqual(['beta']);
  });

  it('should raise IOError for a corrupt project file', async () => {
    const projectDir = join(dir, 'references', 'broken');
    await mkdir(projectDir, { recursive: true });
    await writeFile(join(projectDir, 'project.json'), '{ not json');

    await expect(fileManager.loadProject('broken')).rejects.toThrow(IOError);
  });

  it('should raise IOError for a project file of the wrong shape', async () => {
    const projectDir = join(dir, 'references', 'odd');
    await mkdir(projectDir, { recursive: true });
    await writeFile(join(projectDir, 'project.json'), JSON.stringify({ name: 'odd', references: [1] }));

    await expect(fileManager.loadProject('odd')).rejects.toThrow('Unexpected file contents');
  });

  it('should copy files and report a missing source', async () => {
    const source = join(dir, 'paper.pdf');
    await writeFile(source, 'pdf bytes');
    const projectDir = await fileManager.getProjectDir('thesis');

    await fileManager.copyFile(source, join(projectDir, 'copy.pdf'));

    expect(await readFile(join(projectDir, 'copy.pdf'), 'utf8')).toBe('pdf bytes');
    await expect(fileManager.copyFile(join(dir, 'missing.pdf'), join(projectDir, 'x.pdf'))).rejects.toThrow(
      IOError
    );
  });
});
