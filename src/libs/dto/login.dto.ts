import { IsString, IsNotEmpty } from 'class-validator';
import { ValidationMessage } from '../enums';

export class LoginDto {
	@IsString({ message: ValidationMessage.FIELD_INVALID })
	@IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
	token!: string;
}
