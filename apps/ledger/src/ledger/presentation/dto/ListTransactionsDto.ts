import { IsNotEmpty, IsString, Matches } from 'class-validator';

export class ListTransactionsDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: '$property must not be blank' })
  userId!: string;
}
