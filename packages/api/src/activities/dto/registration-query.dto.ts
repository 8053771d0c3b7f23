import { IsString } from 'class-validator';

export class RegistrationQueryDto {
  @IsString()
  email!: string;
}
