import { Injectable } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../database/supabase.service';
import { describeError } from '../utils/guards';
import { AnswerResult, AnswerService, QuestionInput } from './collaborators.interface';
import { parseAnswerResult } from './supabase-rows';

const ANSWER_FUNCTION = 'answer-question';

@Injectable()
export class SupabaseAnswerService implements AnswerService {
  private readonly supabase: SupabaseClient;

  constructor(private readonly supabaseService: SupabaseService) {
    this.supabase = this.supabaseService.getClient();
  }

  async answer(lessonId: string, input: QuestionInput): Promise<AnswerResult> {
    const { data, error } = await this.supabase.functions.invoke(ANSWER_FUNCTION, {
      body: { lesson_id: lessonId, question: input.question, method: input.method },
    });
    if (error) {
      throw new Error(`Answer generation for lesson ${lessonId} failed: ${describeError(error)}`);
    }

    const result = parseAnswerResult(data);
    if (!result) {
      throw new Error(`Answer generation for lesson ${lessonId} returned an unexpected payload`);
    }
    return result;
  }
}
