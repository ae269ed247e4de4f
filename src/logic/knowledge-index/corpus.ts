import fg from 'fast-glob';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { normalizeText } from '../../utils/textNormalizer';
import { KnowledgeCategory } from '../../utils/types';

const CATEGORY_ALIASES: Record<string, KnowledgeCategory> = {
    red_flag: KnowledgeCategory.EMERGENCY,
    emergency: KnowledgeCategory.EMERGENCY,
    [KnowledgeCategory.EMERGENCY]: KnowledgeCategory.EMERGENCY,
    self_care: KnowledgeCategory.SELF_CARE,
    [KnowledgeCategory.SELF_CARE]: KnowledgeCategory.SELF_CARE,
    appointment: KnowledgeCategory.APPOINTMENT,
    [KnowledgeCategory.APPOINTMENT]: KnowledgeCategory.APPOINTMENT,
};

const corpusLineSchema = z.object({
    id: z.string().trim().min(1),
    text: z.string().trim().min(1),
    source_name: z.string().default(''),
    source_url: z.string().default(''),
    category: z.string().default('appointment'),
    tags: z.array(z.string()).default([]),
});

export interface CorpusEntry {
    id: string;
    text: string;
    sourceName: string;
    sourceUrl: string;
    category: KnowledgeCategory;
    tags: string[];
}

export interface SkippedLine {
    file: string;
    line: number;
    reason: string;
}

export interface ParsedCorpus {
    entries: CorpusEntry[];
    skipped: SkippedLine[];
}

/** Unknown categories land on appointment, never on self-care. */
export function toCategory(raw: string): KnowledgeCategory {
    return CATEGORY_ALIASES[raw.trim().toLowerCase()] ?? KnowledgeCategory.APPOINTMENT;
}

export function parseCorpusLines(content: string, file = '<inline>'): ParsedCorpus {
    const entries: CorpusEntry[] = [];
    const skipped: SkippedLine[] = [];
    const seen = new Set<string>();

    content.split(/\r?\n/).forEach((raw, index) => {
        const line = raw.trim();
        if (!line) return;
        const lineNo = index + 1;

        let json: unknown;
        try {
            json = JSON.parse(line);
        } catch (error) {
            skipped.push({ file, line: lineNo, reason: 'invalid JSON' });
            return;
        }
        const parsed = corpusLineSchema.safeParse(json);
        if (!parsed.success) {
            skipped.push({ file, line: lineNo, reason: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') });
            return;
        }
        const row = parsed.data;
        if (seen.has(row.id)) {
            skipped.push({ file, line: lineNo, reason: `duplicate id ${row.id}` });
            return;
        }
        seen.add(row.id);
        entries.push({
            id: row.id,
            text: normalizeText(row.text),
            sourceName: row.source_name,
            sourceUrl: row.source_url,
            category: toCategory(row.category),
            tags: row.tags,
        });
    });

    return { entries, skipped };
}

/**
 * Reads every JSONL file matching the pattern, in sorted path order so the
 * insertion order (and with it tie-breaking) is stable across runs.
 */
export async function loadCorpus(pattern: string): Promise<ParsedCorpus & { files: string[] }> {
    const files = (await fg([pattern], { onlyFiles: true, absolute: true })).sort();
    const entries: CorpusEntry[] = [];
    const skipped: SkippedLine[] = [];
    const ids = new Set<string>();

    for (const file of files) {
        const parsed = parseCorpusLines(await readFile(file, 'utf8'), file);
        skipped.push(...parsed.skipped);
        for (const entry of parsed.entries) {
            if (ids.has(entry.id)) {
                skipped.push({ file, line: 0, reason: `duplicate id ${entry.id}` });
                continue;
            }
            ids.add(entry.id);
            entries.push(entry);
        }
    }
    return { entries, skipped, files };
}
