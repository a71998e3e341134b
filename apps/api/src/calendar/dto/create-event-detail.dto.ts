import { IsNotEmpty, IsString } from 'class-validator';

export class CreateEventDetailDto {
  @IsString()
  @IsNotEmpty({ message: 'detail is required' })
  detail!: string;
}
