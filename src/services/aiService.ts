import fs from 'fs/promises';
import path from 'path';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { JobDetailsFile } from '../types/types';
import { settings } from '../config/settings';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';
import { isRecord } from '../utils/validators';
import { JOB_DETAILS_FILE } from './folderService';

export const SECTION_NAMES = ['experience', 'skills', 'projects', 'header', 'education'] as const;
export type SectionName = (typeof SECTION_NAMES)[number];

export const DEFAULT_PROMPT_TEMPLATE = path.resolve(__dirname, '../../templates/tailor_prompt.txt');
export const AI_RESPONSE_FILE = 'ai_response.json';

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface SectionFile {
  name: SectionName;
  path: string;
  content: string;
}

/**
 * Model reply; raw_response is set when the text was not the expected JSON
 */
export interface TailorReply {
  sections: Partial<Record<SectionName, string>>;
  summary?: string;
  raw_response?: string;
}

export interface TailorOptions {
  generator?: TextGenerator;
  templatePath?: string;
  dryRun?: boolean;
}

export interface TailorResult {
  prompt: string;
  reply?: TailorReply;
  updated: SectionName[];
  responseFile?: string;
}

function isSectionName(name: string): name is SectionName {
  return SECTION_NAMES.some((section) => section === name);
}

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

export async function loadJobDetails(folder: string): Promise<JobDetailsFile> {
  const file = path.join(folder, JOB_DETAILS_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch {
    throw new Error(`${JOB_DETAILS_FILE} not found in ${folder}`);
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`${file} does not contain a JSON object`);
  }

  return {
    job_title: stringField(parsed, 'job_title') || 'Unknown Position',
    company_name: stringField(parsed, 'company_name') || 'Unknown Company',
    job_description: stringField(parsed, 'job_description'),
    location: stringField(parsed, 'location'),
    job_link: stringField(parsed, 'job_link'),
    applicants: stringField(parsed, 'applicants'),
    salary_range: stringField(parsed, 'salary_range'),
    job_type: stringField(parsed, 'job_type'),
    seniority_level: stringField(parsed, 'seniority_level'),
    skills_required: stringField(parsed, 'skills_required'),
    source_search_title: stringField(parsed, 'source_search_title'),
    created_at: stringField(parsed, 'created_at'),
    source_json_file: stringField(parsed, 'source_json_file')
  };
}

/**
 * Section .tex files present under <folder>/sections; missing ones are skipped
 */
export async function findSectionFiles(folder: string): Promise<SectionFile[]> {
  const sectionsDir = path.join(folder, 'sections');
  try {
    await fs.access(sectionsDir);
  } catch {
    throw new Error(`Sections directory not found: ${sectionsDir}`);
  }

  const sections: SectionFile[] = [];
  for (const name of SECTION_NAMES) {
    const file = path.join(sectionsDir, `${name}.tex`);
    try {
      sections.push({ name, path: file, content: await fs.readFile(file, 'utf-8') });
    } catch {
      logger.warn(`${file} not found, skipping`);
    }
  }
  return sections;
}

/**
 * Replace {name} placeholders in one pass; unknown names are left as written
 */
export function renderPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

export function promptValues(folder: string, job: JobDetailsFile, sections: SectionFile[]): Record<string, string> {
  const values: Record<string, string> = {
    company_name: job.company_name,
    job_title: job.job_title,
    job_description: job.job_description,
    skills_required: job.skills_required,
    seniority_level: job.seniority_level,
    location: job.location,
    section_path: path.join(folder, 'sections'),
    resume_tex_path: path.join(folder, 'resume.tex'),
    section_names: sections.map((section) => section.name).join(', '),
    sections: sections
      .map((section) => `=== ${section.name} ===\n${section.content.trim()}`)
      .join('\n\n')
  };

  for (const section of sections) {
    values[`${section.name}_tex_path`] = section.path;
    values[`${section.name}_tex`] = section.content;
  }
  return values;
}

/**
 * Parse the model's reply. Code fences are stripped; anything that is not a
 * JSON object with a sections object comes back as raw_response.
 */
export function parseAIResponse(aiResponse: string): TailorReply {
  const jsonStr = aiResponse
    .trim()
    .replace(/^```(?:json)?/i, '')
    .replace(/```$/, '')
    .trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch (error) {
    logger.warn(`Could not parse AI response as JSON: ${describeError(error)}`);
    return { sections: {}, raw_response: aiResponse };
  }

  if (!isRecord(parsed) || !isRecord(parsed.sections)) {
    logger.warn('AI response has no sections object');
    return { sections: {}, raw_response: aiResponse };
  }

  const sections: Partial<Record<SectionName, string>> = {};
  for (const [name, content] of Object.entries(parsed.sections)) {
    if (isSectionName(name) && typeof content === 'string' && content.trim()) {
      sections[name] = content;
    }
  }

  const reply: TailorReply = { sections };
  if (typeof parsed.summary === 'string') {
    reply.summary = parsed.summary;
  }
  return reply;
}

/**
 * Gemini-backed generator
 * @throws Error when no API key is configured
 */
export function createGeminiGenerator(
  apiKey: string = settings.geminiApiKey,
  modelName: string = settings.geminiModel
): TextGenerator {
  if (!apiKey) {
    throw new Error('No Gemini API key available. Set GEMINI_API_KEY in your environment.');
  }

  const client = new GoogleGenerativeAI(apiKey);
  const model = client.getGenerativeModel({
    model: modelName,
    generationConfig: {
      temperature: 0.4,
      topK: 40,
      topP: 0.95,
      maxOutputTokens: 8192,
      responseMimeType: 'application/json'
    }
  });

  return {
    async generate(prompt: string): Promise<string> {
      try {
        logger.info(`Using model: ${modelName}`);
        const result = await model.generateContent(prompt);
        return result.response.text();
      } catch (error) {
        const errorMessage = describeError(error);
        logger.error(`Error with model ${modelName}: ${errorMessage}`);

        if (errorMessage.includes('API key not valid')) {
          throw new Error('The API key is not valid. Please check GEMINI_API_KEY and try again.');
        } else if (errorMessage.includes('quota')) {
          throw new Error('API quota exceeded. Please try again later.');
        } else {
          throw new Error(`Failed to tailor resume: ${errorMessage}`);
        }
      }
    }
  };
}

/**
 * Tailor the section files of one resume folder to its job_details.json.
 * Sections in the reply overwrite the matching .tex files; the parsed reply
 * is kept in ai_response.json.
 */
export async function tailorResume(folder: string, options: TailorOptions = {}): Promise<TailorResult> {
  const resumePath = path.resolve(folder);
  const stat = await fs.stat(resumePath).catch(() => null);
  if (!stat) {
    throw new Error(`Resume folder not found: ${resumePath}`);
  }
  if (!stat.isDirectory()) {
    throw new Error(`Path is not a directory: ${resumePath}`);
  }

  const job = await loadJobDetails(resumePath);
  logger.info(`Tailoring resume for ${job.job_title} at ${job.company_name}`);

  const templatePath = path.resolve(options.templatePath ?? DEFAULT_PROMPT_TEMPLATE);
  const template = await fs.readFile(templatePath, 'utf-8').catch(() => {
    throw new Error(`Template file not found: ${templatePath}`);
  });

  const sections = await findSectionFiles(resumePath);
  logger.info(`Found ${sections.length} section files`);

  const prompt = renderPrompt(template, promptValues(resumePath, job, sections));
  if (options.dryRun) {
    return { prompt, updated: [] };
  }

  const generator = options.generator ?? createGeminiGenerator();
  const text = await generator.generate(prompt);
  logger.info(`Response length: ${text.length} characters`);

  const reply = parseAIResponse(text);
  const updated: SectionName[] = [];

  for (const section of sections) {
    const content = reply.sections[section.name];
    if (content === undefined) {
      continue;
    }
    await fs.writeFile(section.path, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
    updated.push(section.name);
  }

  const responseFile = path.join(resumePath, AI_RESPONSE_FILE);
  await fs.writeFile(responseFile, JSON.stringify(reply, null, 2), 'utf-8');

  logger.info(`Updated sections: ${updated.length > 0 ? updated.join(', ') : 'none'}`);
  logger.info(`Full response saved to: ${responseFile}`);

  return { prompt, reply, updated, responseFile };
}
