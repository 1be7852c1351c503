// Question Service
// Client for the question-generation function

import type { QuestionRequest, QuestionResponse } from '@reverie/contracts';
import type { SupabaseClient } from './supabase.js';

const QUESTIONS_FUNCTION = 'questions';

export interface QuestionService {
    validateAnswer(request: QuestionRequest): Promise<QuestionResponse>;
    requestNextQuestion(request: QuestionRequest): Promise<QuestionResponse>;
}

export class SupabaseQuestionService implements QuestionService {
    constructor(private readonly client: SupabaseClient) {}

    validateAnswer(request: QuestionRequest): Promise<QuestionResponse> {
        return this.client.invokeFunction<QuestionResponse>(QUESTIONS_FUNCTION, request);
    }

    requestNextQuestion(request: QuestionRequest): Promise<QuestionResponse> {
        return this.client.invokeFunction<QuestionResponse>(QUESTIONS_FUNCTION, request);
    }
}
