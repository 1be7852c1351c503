// Question Pool
// Local prompts used when the question service is unreachable or returns nothing

export interface QuestionTemplate {
    text: string;
    coverageTag: string;
}

export const INITIAL_QUESTION: QuestionTemplate = {
    text: 'How was your day',
    coverageTag: 'event',
};

export const QUESTION_TEMPLATES: readonly QuestionTemplate[] = [
    { text: 'What felt most important today?', coverageTag: 'values' },
    { text: 'What moment stayed with you the most?', coverageTag: 'event' },
    { text: 'What felt heavier than you expected?', coverageTag: 'emotion' },
    { text: 'What gave you a small sense of progress?', coverageTag: 'action' },
    { text: 'What are you grateful for right now?', coverageTag: 'gratitude' },
    { text: 'Who influenced your day the most?', coverageTag: 'relationships' },
    { text: 'What did your body need today?', coverageTag: 'health' },
    { text: 'What took most of your energy?', coverageTag: 'work' },
    { text: 'What would you want to remember from today?', coverageTag: 'values' },
    { text: 'What surprised you today?', coverageTag: 'event' },
    { text: 'What did you avoid today?', coverageTag: 'cause' },
    { text: 'What helped you feel grounded?', coverageTag: 'emotion' },
];

export class QuestionPool {
    constructor(
        private readonly templates: readonly QuestionTemplate[] = QUESTION_TEMPLATES,
        private readonly random: () => number = Math.random
    ) {}

    /**
     * Random template whose text mentions no avoided topic and whose tag was not
     * asked recently. Falls back to the whole pool when nothing is left.
     */
    randomQuestion(avoidTopics: readonly string[] = [], excludingTags: readonly string[] = []): QuestionTemplate {
        const avoided = avoidTopics.map(topic => topic.trim().toLowerCase()).filter(topic => topic.length > 0);
        const excluded = new Set(excludingTags);

        const candidates = this.templates.filter(template => {
            const text = template.text.toLowerCase();
            return !excluded.has(template.coverageTag) && !avoided.some(topic => text.includes(topic));
        });

        return this.pick(candidates.length > 0 ? candidates : this.templates);
    }

    private pick(templates: readonly QuestionTemplate[]): QuestionTemplate {
        const index = Math.min(templates.length - 1, Math.floor(this.random() * templates.length));
        return templates[Math.max(0, index)] ?? INITIAL_QUESTION;
    }
}
