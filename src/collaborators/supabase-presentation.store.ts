import { Injectable } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../database/supabase.service';
import { SlideContent } from '../lesson-session/lesson-session.interface';
import { PresentationStore } from './collaborators.interface';
import { parseSlideRow } from './supabase-rows';

const SLIDES_TABLE = 'lesson_slides'; // one row per slide, narration audio generated on upload

@Injectable()
export class SupabasePresentationStore implements PresentationStore {
  private readonly supabase: SupabaseClient;

  constructor(private readonly supabaseService: SupabaseService) {
    this.supabase = this.supabaseService.getClient();
  }

  async slideCount(lessonId: string): Promise<number> {
    const { count, error } = await this.supabase
      .from(SLIDES_TABLE)
      .select('slide_number', { count: 'exact', head: true })
      .eq('lesson_id', lessonId);

    if (error) {
      throw new Error(`Failed to count slides of lesson ${lessonId}: ${error.message}`);
    }
    return count ?? 0;
  }

  async slide(lessonId: string, index: number): Promise<SlideContent> {
    const { data, error } = await this.supabase
      .from(SLIDES_TABLE)
      .select('slide_number, text, audio_path, image_path')
      .eq('lesson_id', lessonId)
      .eq('slide_number', index)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load slide ${index} of lesson ${lessonId}: ${error.message}`);
    }
    const slide = parseSlideRow(data, index);
    if (!slide) {
      throw new Error(`Slide ${index} of lesson ${lessonId} not found`);
    }
    return slide;
  }
}
