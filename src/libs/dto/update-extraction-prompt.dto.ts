import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ValidationMessage } from '../enums';

export class UpdateExtractionPromptDto {
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
	@MaxLength(20000, { message: ValidationMessage.FIELD_INVALID })
	prompt!: string;
}
