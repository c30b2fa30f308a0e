import { Injectable } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseService } from '../database/supabase.service';
import { describeError } from '../utils/guards';
import { AttendanceMatch, AttendanceScanner } from './collaborators.interface';
import { parseAttendanceMatches } from './supabase-rows';

const SCAN_FUNCTION = 'scan-attendance';

@Injectable()
export class SupabaseAttendanceScanner implements AttendanceScanner {
  private readonly supabase: SupabaseClient;

  constructor(private readonly supabaseService: SupabaseService) {
    this.supabase = this.supabaseService.getClient();
  }

  async scan(lessonId: string): Promise<AttendanceMatch[]> {
    const { data, error } = await this.supabase.functions.invoke(SCAN_FUNCTION, {
      body: { lesson_id: lessonId },
    });
    if (error) {
      throw new Error(`Attendance scan for lesson ${lessonId} failed: ${describeError(error)}`);
    }
    return parseAttendanceMatches(data);
  }
}
