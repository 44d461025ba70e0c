import { PatternRule } from '../../config/guardrails.config';

export interface RedactionCount {
    rule: string;
    count: number;
}

export interface RedactionResult {
    text: string;
    /** Only rules that matched, in rule order. */
    counts: RedactionCount[];
}

/**
 * Replace every match of each rule with `placeholder`. Rules run in order, so an earlier
 * rule's replacement is never re-matched by a later, broader one.
 */
export function redactText(text: string, rules: PatternRule[], placeholder: string): RedactionResult {
    const counts: RedactionCount[] = [];
    let redacted = text;

    for (const rule of rules) {
        let count = 0;
        redacted = redacted.replace(rule.pattern, () => {
            count++;
            return placeholder;
        });
        if (count > 0) {
            counts.push({ rule: rule.name, count });
        }
    }

    return { text: redacted, counts };
}
