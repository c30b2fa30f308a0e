import { Injectable } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../database/supabase.service';
import { LessonRecord, LessonStore } from './collaborators.interface';
import { parseLessonIds, parseLessonRecord } from './supabase-rows';

const LESSONS_TABLE = 'lessons';

@Injectable()
export class SupabaseLessonStore implements LessonStore {
  private readonly supabase: SupabaseClient;

  constructor(private readonly supabaseService: SupabaseService) {
    this.supabase = this.supabaseService.getClient();
  }

  async dueLessons(now: Date, windowMinutes: number): Promise<string[]> {
    const earliest = new Date(now.getTime() - windowMinutes * 60_000);
    const { data, error } = await this.supabase
      .from(LESSONS_TABLE)
      .select('id')
      .eq('status', 'scheduled')
      .gte('scheduled_at', earliest.toISOString())
      .lte('scheduled_at', now.toISOString())
      .order('scheduled_at', { ascending: true });

    if (error) {
      throw new Error(`Failed to query due lessons: ${error.message}`);
    }
    return parseLessonIds(data);
  }

  async find(lessonId: string): Promise<LessonRecord | null> {
    const { data, error } = await this.supabase
      .from(LESSONS_TABLE)
      .select('id, title, status, scheduled_at, started_at, ended_at')
      .eq('id', lessonId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load lesson ${lessonId}: ${error.message}`);
    }
    return parseLessonRecord(data);
  }

  async markStarted(lessonId: string, at: Date): Promise<void> {
    // only a still-scheduled lesson moves to in_progress
    const { error } = await this.supabase
      .from(LESSONS_TABLE)
      .update({ status: 'in_progress', started_at: at.toISOString() })
      .eq('id', lessonId)
      .eq('status', 'scheduled');

    if (error) {
      throw new Error(`Failed to mark lesson ${lessonId} started: ${error.message}`);
    }
  }

  async markCompleted(lessonId: string, at: Date): Promise<void> {
    const { error } = await this.supabase
      .from(LESSONS_TABLE)
      .update({ status: 'completed', ended_at: at.toISOString() })
      .eq('id', lessonId)
      .in('status', ['scheduled', 'in_progress']);

    if (error) {
      throw new Error(`Failed to mark lesson ${lessonId} completed: ${error.message}`);
    }
  }
}
