import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AI_RESPONSE_FILE,
  TextGenerator,
  parseAIResponse,
  renderPrompt,
  tailorResume
} from '../src/services/aiService';
import { makeTempDir, removeDir } from './helpers';

class FakeGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply;
  }
}

describe('renderPrompt', () => {
  it('fills known placeholders and leaves the rest alone', () => {
    expect(renderPrompt('{job_title} at {company_name} {unknown} {"sections": {}}', {
      job_title: 'Data Analyst',
      company_name: 'Acme'
    })).toBe('Data Analyst at Acme {unknown} {"sections": {}}');
  });

  it('does not expand placeholders inside substituted values', () => {
    expect(renderPrompt('{job_description}', {
      job_description: 'Use {company_name} style',
      company_name: 'Acme'
    })).toBe('Use {company_name} style');
  });
});

describe('parseAIResponse', () => {
  it('strips code fences and keeps known sections', () => {
    const reply = parseAIResponse('```json\n{"sections": {"skills": "SQL, Python", "hobbies": "Chess", "projects": "  "}, "summary": "Moved SQL first"}\n```');

    expect(reply).toEqual({ sections: { skills: 'SQL, Python' }, summary: 'Moved SQL first' });
  });

  it('returns the raw text when the reply is not JSON', () => {
    expect(parseAIResponse('Sorry, I cannot help')).toEqual({
      sections: {},
      raw_response: 'Sorry, I cannot help'
    });
  });

  it('returns the raw text when there is no sections object', () => {
    expect(parseAIResponse('{"skills": "SQL"}')).toEqual({
      sections: {},
      raw_response: '{"skills": "SQL"}'
    });
  });
});

describe('tailorResume', () => {
  let root: string;
  let folder: string;
  let templatePath: string;

  beforeEach(() => {
    root = makeTempDir();
    folder = path.join(root, 'acme_abc123');
    fs.mkdirSync(path.join(folder, 'sections'), { recursive: true });
    fs.writeFileSync(path.join(folder, 'sections', 'skills.tex'), 'Excel\n');
    fs.writeFileSync(path.join(folder, 'sections', 'experience.tex'), 'Analyst at Initech\n');
    fs.writeFileSync(path.join(folder, 'job_details.json'), JSON.stringify({
      job_title: 'Data Analyst',
      company_name: 'Acme',
      job_description: 'Own reporting.',
      location: 'Toronto, ON'
    }));
    templatePath = path.join(root, 'prompt.txt');
    fs.writeFileSync(templatePath, '{job_title} @ {company_name}\n{section_names}\n{sections}');
  });

  afterEach(() => {
    removeDir(root);
  });

  it('rewrites the returned sections and keeps the reply', async () => {
    const generator = new FakeGenerator('{"sections": {"skills": "SQL, Excel"}, "summary": "Added SQL"}');

    const result = await tailorResume(folder, { generator, templatePath });

    const expectedPrompt = 'Data Analyst @ Acme\nexperience, skills\n' +
      '=== experience ===\nAnalyst at Initech\n\n=== skills ===\nExcel';
    expect(generator.prompts).toEqual([expectedPrompt]);
    expect(result.updated).toEqual(['skills']);
    expect(fs.readFileSync(path.join(folder, 'sections', 'skills.tex'), 'utf-8')).toBe('SQL, Excel\n');
    expect(fs.readFileSync(path.join(folder, 'sections', 'experience.tex'), 'utf-8')).toBe('Analyst at Initech\n');

    const saved: unknown = JSON.parse(fs.readFileSync(path.join(folder, AI_RESPONSE_FILE), 'utf-8'));
    expect(saved).toEqual({ sections: { skills: 'SQL, Excel' }, summary: 'Added SQL' });
    expect(result.responseFile).toBe(path.join(folder, AI_RESPONSE_FILE));
  });

  it('only renders the prompt on a dry run', async () => {
    const generator = new FakeGenerator('{}');

    const result = await tailorResume(folder, { generator, templatePath, dryRun: true });

    expect(result.prompt.startsWith('Data Analyst @ Acme')).toBe(true);
    expect(result.updated).toEqual([]);
    expect(generator.prompts).toEqual([]);
    expect(fs.existsSync(path.join(folder, AI_RESPONSE_FILE))).toBe(false);
  });

  it('leaves the sections untouched when the reply is not JSON', async () => {
    const result = await tailorResume(folder, { generator: new FakeGenerator('not json'), templatePath });

    expect(result.updated).toEqual([]);
    expect(result.reply?.raw_response).toBe('not json');
    expect(fs.readFileSync(path.join(folder, 'sections', 'skills.tex'), 'utf-8')).toBe('Excel\n');
  });

  it('needs job details in the folder', async () => {
    fs.rmSync(path.join(folder, 'job_details.json'));

    await expect(tailorResume(folder, { generator: new FakeGenerator('{}'), templatePath }))
      .rejects.toThrow(`job_details.json not found in ${folder}`);
  });

  it('reports a missing folder', async () => {
    const missing = path.join(root, 'missing');

    await expect(tailorResume(missing, { templatePath })).rejects.toThrow(`Resume folder not found: ${missing}`);
  });
});
