import { Transform } from 'class-transformer';
import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { QuestionMethod } from '../lesson-session.interface';

export class AskQuestionDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  question!: string; // question text, or the stored audio reference for spoken questions

  @IsOptional()
  @IsIn(['text', 'audio'])
  method?: QuestionMethod;
}
