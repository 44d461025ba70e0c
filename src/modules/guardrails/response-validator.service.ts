import { Inject, Injectable, Logger } from '@nestjs/common';
import guardrailsConfig, { GuardrailsSettings } from '../../config/guardrails.config';
import { redactText } from '../../common/utils/redaction.util';
import { ResponseAnnotation, ValidatedResponse } from './types';

const MIN_ECHO_FRAGMENT_LENGTH = 24;
const LEADING_ANSWER_CUE = /^\s*(?:helpful\s+answer|answer)\s*:\s*/i;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Response Validator Service - post-filters generated answers.
 *
 * Removes echoed instruction and notice sentences, strips a leading answer cue and
 * redacts account-number-shaped identifiers. It never rejects an answer.
 */
@Injectable()
export class ResponseValidatorService {
    private readonly logger = new Logger(ResponseValidatorService.name);
    private readonly echoPatterns: RegExp[];

    constructor(@Inject(guardrailsConfig.KEY) private readonly settings: GuardrailsSettings) {
        const { notices } = settings;
        const sources = [
            settings.systemInstructions,
            notices.security,
            notices.outOfDomain,
            notices.noContext,
            notices.generationUnavailable,
        ];

        const fragments = new Set<string>();
        for (const source of sources) {
            for (const sentence of source.split(/(?<=[.!?])\s+|\n+/)) {
                const trimmed = sentence.trim();
                if (trimmed.length >= MIN_ECHO_FRAGMENT_LENGTH) {
                    fragments.add(trimmed);
                }
            }
        }

        // Case-insensitive; any run of whitespace matches any other.
        this.echoPatterns = [...fragments].map(
            (fragment) => new RegExp(fragment.split(/\s+/).map(escapeRegExp).join('\\s+'), 'gi'),
        );
    }

    validate(raw: string): ValidatedResponse {
        const annotations: ResponseAnnotation[] = [];
        let text = raw;

        let echoes = 0;
        for (const pattern of this.echoPatterns) {
            text = text.replace(pattern, () => {
                echoes++;
                return '';
            });
        }
        if (echoes > 0) {
            annotations.push({ kind: 'instruction_echo_removed', detail: `${echoes} echoed sentence(s) removed` });
        }

        if (LEADING_ANSWER_CUE.test(text)) {
            text = text.replace(LEADING_ANSWER_CUE, '');
            annotations.push({ kind: 'answer_cue_removed', detail: 'Leading answer label removed' });
        }

        const redaction = redactText(text, this.settings.redactionPatterns, this.settings.redactionPlaceholder);
        for (const { rule, count } of redaction.counts) {
            annotations.push({ kind: 'redacted', detail: `${count} ${rule} value(s) redacted` });
        }

        text = this.tidy(redaction.text);

        if (annotations.length > 0) {
            this.logger.warn(`🛡️ Response modified: ${annotations.map((a) => a.detail).join('; ')}`);
        }

        return { text, annotations };
    }

    private tidy(text: string): string {
        return text
            .split('\n')
            .map((line) => line.replace(/[ \t]{2,}/g, ' ').trim())
            .join('\n')
            .replace(/\n{3,}/g, '\n\n')
            .trim();
    }
}
