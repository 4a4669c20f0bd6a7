import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Project } from '../src/models';
import { FileCopier, ProjectData, ProjectStore } from '../src/types/interfaces';

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'refman-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Project store kept in memory; saves snapshot the project */
export class MemoryProjectStore implements ProjectStore {
  readonly projects = new Map<string, Project>();
  failSaves = false;
  saveCount = 0;

  async loadProject(name: string): Promise<ProjectData | null> {
    const project = this.projects.get(name);
    return project ? new Project(project.name, project.references.values()) : null;
  }

  async saveProject(project: ProjectData): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    this.saveCount++;
    this.projects.set(project.name, new Project(project.name, project.references.values()));
  }

  async listProjects(): Promise<string[]> {
    return Array.from(this.projects.keys()).sort();
  }

  async deleteProject(name: string): Promise<boolean> {
    return this.projects.delete(name);
  }

  async getProjectDir(name: string): Promise<string> {
    return `/projects/${name}`;
  }
}

export class RecordingFileCopier implements FileCopier {
  readonly copies: Array<[string, string]> = [];

  async copyFile(sourcePath: string, destPath: string): Promise<void> {
    this.copies.push([sourcePath, destPath]);
  }
}
