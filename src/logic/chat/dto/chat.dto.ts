import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class ChatQueryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  // number of prior turns to include; clamped to the memory window
  @IsOptional()
  @IsInt()
  @Min(0)
  priorTurnsHint?: number;
}
