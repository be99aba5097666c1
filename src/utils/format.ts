import type { Location } from './types.js';
import type { ParseError } from '../parser/index.js';
import { highlightLine, highlightSnippet } from './highlight.js';
import { type ImpDiagnostic, formatDiagnostic } from '../imp/diagnostics.js';
import * as colors from 'colorette';

// Safe wrapper for unknown errors
export function toParseError(err: unknown): ParseError {
    if (err instanceof Error) {
        return { success: false, error: err.message, stack: err.stack };
    }
    return {
        success: false,
        error: typeof err === 'string' ? err : 'Unknown error',
    };
}

export function formatLocation(location: Location): string {
    const { start, end } = location;
    return (start.line === end.line && start.column === end.column)
        ? `Line ${start.line}, Col ${start.column}`
        : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

function snippetOf(error: ParseError, useColors: boolean): string | undefined {
    if (error.input !== undefined && error.location) {
        return highlightSnippet(error.input, error.location, useColors);
    }
    return error.snippet;
}

export function formatError(error: ParseError): string {
    return formatErrorWithColors(error, false);
}

export function formatErrorWithColors(error: ParseError, useColors: boolean = true): string {
    const paint = (color: (text: string) => string, text: string) => (useColors ? color(text) : text);
    const errorMessage = error.error || 'Unknown error';
    const parts: string[] = [`${paint(colors.red, '❌ Parse Error:')} ${errorMessage}`];

    if (error.location) {
        parts.push(`${paint(colors.blue, '↪ at')} ${formatLocation(error.location)}`);
    }

    if (error.expected && error.expected.length > 0) {
        parts.push(`${paint(colors.yellow, 'Expected:')} ${error.expected.join(', ')}`);
    }

    if (error.found !== undefined && error.found !== null) {
        parts.push(`${paint(colors.yellow, 'Found:')} "${error.found}"`);
    }

    const snippet = snippetOf(error, useColors);
    if (snippet) {
        parts.push('\n' + paint(colors.dim, '--- Snippet ---') + '\n' + snippet);
    }

    return parts.join('\n');
}

export function formatAnyError(err: unknown, useColors: boolean = true): string {
    return formatErrorWithColors(toParseError(err), useColors);
}

export function formatCompilationError(message: string, location: Location, grammarSource: string): string {
    return formatErrorWithColors({ success: false, error: message, location, input: grammarSource }, true);
}

/**
 * One semantic diagnostic in the `[Line n] semantic error: …` form, followed by
 * the offending source line when the source is at hand.
 */
export function formatSemanticDiagnostic(
    diagnostic: ImpDiagnostic,
    source?: string,
    useColors: boolean = true
): string {
    const headline = formatDiagnostic(diagnostic);
    const parts = [useColors ? colors.red(headline) : headline];
    if (source !== undefined) {
        const snippet = highlightLine(source, diagnostic.line, useColors);
        if (snippet) parts.push(snippet);
    }
    return parts.join('\n');
}

export function formatDiagnosticSummary(count: number, file: string, useColors: boolean = true): string {
    const text = `${count} semantic error${count === 1 ? '' : 's'} in ${file}`;
    return useColors ? colors.bold(colors.red(text)) : text;
}
