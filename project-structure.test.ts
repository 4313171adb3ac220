import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

describe('Project Structure', () => {
  const projectRoot = fileURLToPath(new URL('.', import.meta.url));

  describe('Root Configuration Files', () => {
    it('should have package.json with correct configuration', () => {
      const packageJsonPath = path.join(projectRoot, 'package.json');
      expect(existsSync(packageJsonPath)).toBe(true);

      const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      expect(packageJson.name).toBe('voxqueue');
      expect(packageJson.private).toBe(true);
      expect(packageJson.workspaces).toContain('packages/*');
    });

    it('should have TypeScript configuration', () => {
      const tsconfigPath = path.join(projectRoot, 'tsconfig.json');
      expect(existsSync(tsconfigPath)).toBe(true);

      const tsconfig = JSON.parse(readFileSync(tsconfigPath, 'utf-8'));
      expect(tsconfig.compilerOptions.strict).toBe(true);
    });

    it('should have Vitest configuration', () => {
      expect(existsSync(path.join(projectRoot, 'vitest.config.ts'))).toBe(true);
    });

    it('should document the environment variables', () => {
      const example = readFileSync(path.join(projectRoot, '.env.example'), 'utf-8');
      expect(example).toContain('TTS_MAX_CONCURRENT=');
      expect(example).toContain('TTS_ENGINE=');
    });
  });

  describe('Package Structure', () => {
    const packages = ['shared', 'storage', 'jobs', 'api'];

    packages.forEach(pkg => {
      describe(`Package: ${pkg}`, () => {
        const packagePath = path.join(projectRoot, 'packages', pkg);

        it(`should exist`, () => {
          expect(existsSync(packagePath)).toBe(true);
        });

        it(`should have package.json`, () => {
          const packageJsonPath = path.join(packagePath, 'package.json');
          expect(existsSync(packageJsonPath)).toBe(true);

          const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
          expect(packageJson.name).toBe(`@voxq/${pkg}`);
          expect(packageJson.types).toBe('./src/index.ts');
        });

        it(`should have TypeScript configuration`, () => {
          expect(existsSync(path.join(packagePath, 'tsconfig.json'))).toBe(true);
        });

        it(`should have Vitest configuration`, () => {
          expect(existsSync(path.join(packagePath, 'vitest.config.ts'))).toBe(true);
        });
      });
    });
  });

  describe('API Package', () => {
    const apiPath = path.join(projectRoot, 'packages', 'api', 'src');

    it('should have the HTTP entry point', () => {
      expect(existsSync(path.join(apiPath, 'server.ts'))).toBe(true);
    });

    it('should have a provider per synthesis engine', () => {
      const providers = ['index.ts', 'internal.ts', 'polly.ts', 'traced.ts'];
      providers.forEach(file => {
        expect(existsSync(path.join(apiPath, 'services', 'synthesis', file))).toBe(true);
      });
    });
  });

  describe('Documentation', () => {
    it('should have README.md', () => {
      const readmePath = path.join(projectRoot, 'README.md');
      expect(existsSync(readmePath)).toBe(true);

      const readme = readFileSync(readmePath, 'utf-8');
      expect(readme).toContain('Voxqueue');
      expect(readme).toContain('Quick Start');
      expect(readme).toContain('Development Setup');
    });
  });
});
