import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage, warnOnce } from '../utils';
import { TEMPLATE_KEYS, TemplateKey, TemplatesConfig, TemplatesConfigSchema, TemplateValues } from './templateTypes';

export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', '..', 'templates', 'responses');

export interface TemplateServiceOptions {
    /** JSON file mapping template keys to files, relative to the config file. */
    configFilePath?: string;
    templatesDir?: string;
    /** Template texts that win over both the defaults and the config file. */
    inlineTemplates?: Readonly<Record<string, string>>;
}

export interface TemplateServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
}

const PLACEHOLDER = /\{(\w+)\}/g;

function isTemplateKey(key: string): key is TemplateKey {
    return TEMPLATE_KEYS.some(templateKey => templateKey === key);
}

export class TemplateService {
    private readonly templates = new Map<TemplateKey, string>();
    private loaded = false;

    private readonly configFilePath?: string;
    private readonly configDir?: string;
    private readonly templatesDir: string;
    private readonly inlineTemplates: Readonly<Record<string, string>>;

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;

    constructor(options: TemplateServiceOptions = {}, deps?: TemplateServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;

        this.templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
        this.inlineTemplates = options.inlineTemplates ?? {};
        if (options.configFilePath) {
            this.configFilePath = this.resolvePathFn(options.configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    /**
     * Reads every default template, then applies the config file and the
     * inline overrides. Safe to call more than once; only the first call reads.
     *
     * @throws Error when a default template or a configured override cannot be read
     */
    async load(): Promise<void> {
        if (this.loaded) {
            return;
        }
        for (const key of TEMPLATE_KEYS) {
            const filePath = this.resolvePathFn(this.templatesDir, `${key}.txt`);
            try {
                this.templates.set(key, stripFinalNewline(await this.readFileFn(filePath, 'utf-8')));
            } catch (error) {
                throw new Error(`Error loading default template file ${filePath} for ${key}. Original error: ${errorMessage(error)}`);
            }
        }

        const config = await this.loadConfig();
        for (const [key, entry] of Object.entries(config?.templates ?? {})) {
            if (!isTemplateKey(key)) {
                console.warn(`Ignoring unknown response template "${key}" in ${this.configFilePath}`);
                continue;
            }
            const customPath = this.resolveConfiguredPath(entry.path);
            try {
                this.templates.set(key, stripFinalNewline(await this.readFileFn(customPath, 'utf-8')));
            } catch (error) {
                throw new Error(`Error loading custom template file ${customPath} for ${key}. Original error: ${errorMessage(error)}`);
            }
        }

        for (const [key, text] of Object.entries(this.inlineTemplates)) {
            if (isTemplateKey(key)) {
                this.templates.set(key, text);
            } else {
                console.warn(`Ignoring unknown inline response template "${key}"`);
            }
        }
        this.loaded = true;
    }

    private async loadConfig(): Promise<TemplatesConfig | undefined> {
        if (!this.configFilePath) {
            return undefined;
        }
        let raw: unknown;
        try {
            raw = JSON.parse(await this.readFileFn(this.configFilePath, 'utf-8'));
        } catch (error) {
            throw new Error(`Failed to load or parse template configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
        }
        const parsed = TemplatesConfigSchema.safeParse(raw);
        if (!parsed.success) {
            throw new Error(`Template configuration file ${this.configFilePath} is invalid: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
        }
        return parsed.data;
    }

    private resolveConfiguredPath(templatePath: string): string {
        if (this.isAbsoluteFn(templatePath)) {
            return templatePath;
        }
        return this.configDir ? this.resolvePathFn(this.configDir, templatePath) : this.resolvePathFn(templatePath);
    }

    getTemplate(key: TemplateKey): string {
        const template = this.templates.get(key);
        if (template === undefined) {
            throw new Error(`Response template ${key} is not loaded; call load() first.`);
        }
        return template;
    }

    /** Fills `{name}` placeholders; a placeholder without a value becomes empty. */
    render(key: TemplateKey, values: TemplateValues): string {
        return this.getTemplate(key).replace(PLACEHOLDER, (placeholder: string, name: string) => {
            const value = Object.hasOwn(values, name) ? values[name] : undefined;
            if (value === undefined) {
                warnOnce(`template:${key}:${name}`, `Template ${key} has no value for ${placeholder}`);
                return '';
            }
            return String(value);
        });
    }
}

function stripFinalNewline(text: string): string {
    return text.replace(/\r?\n$/, '');
}
