import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TemplateLoader } from '../loader.js';
import { TemplateRegistry } from '../registry.js';
import { TemplateParseError } from '../schema.js';
import { createMockLogger } from '../../__tests__/test-helpers.js';

describe('TemplateLoader', () => {
  let testDir: string;
  let loader: TemplateLoader;
  let registry: TemplateRegistry;

  const templateYaml = (name: string, title = 'Test Template'): string => `
name: ${name}
title: ${title}
category: Test
sections:
  - name: Section 1
    content: Body
tags: [test]
`;

  beforeEach(async () => {
    loader = new TemplateLoader();
    registry = new TemplateRegistry();
    testDir = await mkdtemp(join(tmpdir(), 'templates-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('loadTemplate', () => {
    it('should load a valid template file', async () => {
      const templatePath = join(testDir, 'test.yaml');
      await writeFile(templatePath, templateYaml('test-template'), 'utf-8');

      const loaded = await loader.loadTemplate(templatePath);

      expect(loaded.name).toBe('test-template');
      expect(loaded.filePath).toBe(templatePath);
      expect(loaded.template.title).toBe('Test Template');
      expect(loaded.template.sections[0]?.content).toBe('Body');
    });

    it('should throw error for invalid template', async () => {
      const templatePath = join(testDir, 'invalid.yaml');
      await writeFile(templatePath, 'title: Missing name and category', 'utf-8');

      await expect(loader.loadTemplate(templatePath)).rejects.toThrow(TemplateParseError);
    });

    it('should log and rethrow for non-existent file', async () => {
      const logger = createMockLogger();
      loader = new TemplateLoader(logger);
      const missing = join(testDir, 'missing.yaml');

      await expect(loader.loadTemplate(missing)).rejects.toThrow();
      expect(logger.warn).toHaveBeenCalledWith(
        `Failed to load template from ${missing}`,
        expect.objectContaining({ error: expect.any(String) })
      );
    });
  });

  describe('loadFromDirectory', () => {
    it('should load all YAML files from directory', async () => {
      await writeFile(join(testDir, 'template1.yaml'), templateYaml('template1'), 'utf-8');
      await writeFile(join(testDir, 'template2.yaml'), templateYaml('template2'), 'utf-8');
      await writeFile(join(testDir, 'template3.yml'), templateYaml('template3'), 'utf-8');

      // Non-YAML files are ignored
      await writeFile(join(testDir, 'readme.md'), '# README', 'utf-8');
      await writeFile(join(testDir, 'config.json'), '{}', 'utf-8');

      const templates = await loader.loadFromDirectory(testDir);

      expect(templates.map((t) => t.name)).toEqual(['template1', 'template2', 'template3']);
    });

    it('should return empty array for non-existent directory', async () => {
      const templates = await loader.loadFromDirectory(join(testDir, 'does-not-exist'));

      expect(templates).toEqual([]);
    });

    it('should skip invalid templates and keep loading', async () => {
      const logger = createMockLogger();
      loader = new TemplateLoader(logger);
      await writeFile(join(testDir, 'a-valid.yaml'), templateYaml('valid'), 'utf-8');
      await writeFile(join(testDir, 'b-invalid.yaml'), 'name: [broken', 'utf-8');

      const templates = await loader.loadFromDirectory(testDir);

      expect(templates.map((t) => t.name)).toEqual(['valid']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Skipping invalid template: b-invalid.yaml',
        expect.objectContaining({ error: expect.any(String) })
      );
    });
  });

  describe('loadAndRegister', () => {
    it('should register loaded templates as masters', async () => {
      await writeFile(join(testDir, 'template1.yaml'), templateYaml('template1'), 'utf-8');
      await writeFile(join(testDir, 'template2.yaml'), templateYaml('template2'), 'utf-8');

      const count = await loader.loadAndRegister(testDir, registry);

      expect(count).toBe(2);
      expect(registry.names()).toEqual(['template1', 'template2']);
      expect(registry.create('template1').tags).toEqual(['test']);
    });

    it('should replace a master already registered under the same name', async () => {
      await writeFile(join(testDir, 'first.yaml'), templateYaml('shared', 'First'), 'utf-8');
      await writeFile(join(testDir, 'second.yaml'), templateYaml('shared', 'Second'), 'utf-8');

      const count = await loader.loadAndRegister(testDir, registry);

      expect(count).toBe(2);
      expect(registry.size).toBe(1);
      expect(registry.create('shared').title).toBe('Second');
    });

    it('should register into any sink', async () => {
      await writeFile(join(testDir, 'template1.yaml'), templateYaml('template1'), 'utf-8');
      const received: string[] = [];

      await loader.loadAndRegister(testDir, {
        register: (name, template) => received.push(`${name}:${template.title}`),
      });

      expect(received).toEqual(['template1:Test Template']);
    });

    it('should return 0 for an empty directory', async () => {
      expect(await loader.loadAndRegister(testDir, registry)).toBe(0);
      expect(registry.size).toBe(0);
    });
  });
});
