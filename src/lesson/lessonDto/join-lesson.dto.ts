import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class JoinLessonDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  lessonId!: string; // lesson to join
}
