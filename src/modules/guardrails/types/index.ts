/**
 * Guardrail type definitions
 */

export type ClassificationLabel = 'in_domain' | 'out_of_domain' | 'jailbreak';

export interface Classification {
    label: ClassificationLabel;
    /** 1 for a lexical jailbreak match, otherwise the deciding cosine similarity. */
    score: number;
    reason: string;
    /** Name of the lexical rule that matched. */
    rule?: string;
}

export type ResponseAnnotationKind = 'answer_cue_removed' | 'instruction_echo_removed' | 'redacted';

export interface ResponseAnnotation {
    kind: ResponseAnnotationKind;
    detail: string;
}

export interface ValidatedResponse {
    text: string;
    annotations: ResponseAnnotation[];
}
