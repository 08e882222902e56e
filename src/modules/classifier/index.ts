import { ClassifierRules, Classification, FetchResult, Outcome } from '../../types';

export class ContentClassifier {

    /**
     * One-shot judgement of a single probe. Order matters: transport and
     * status failures first, then length, then placeholder wording.
     */
    static classify(result: FetchResult, rules: ClassifierRules): Classification {
        if (!result.ok) {
            return { outcome: Outcome.EMPTY, reason: 'transport', detail: result.error.kind };
        }
        if (result.status !== 200) {
            return { outcome: Outcome.EMPTY, reason: 'status', detail: String(result.status) };
        }
        if (result.body.length < rules.minContentLength) {
            return { outcome: Outcome.PARKED, reason: 'short-content', detail: String(result.body.length) };
        }

        const bodyLower = result.body.toLowerCase();
        const phrase = rules.parkedPhrases.find(p => bodyLower.includes(p.toLowerCase()));
        if (phrase !== undefined) {
            return { outcome: Outcome.PARKED, reason: 'parked-phrase', detail: phrase };
        }

        return { outcome: Outcome.LIVE, reason: 'content' };
    }

    static isLive(classification: Classification): boolean {
        return classification.outcome === Outcome.LIVE;
    }
}
