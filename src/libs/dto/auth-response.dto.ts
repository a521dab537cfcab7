export class AuthResponseDto {
	authenticated!: boolean;
	session_id!: string;
	message!: string;
}
