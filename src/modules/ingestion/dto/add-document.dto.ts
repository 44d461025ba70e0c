import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class AddDocumentDto {
    @ApiProperty({ description: 'Knowledge category.', example: 'Loans' })
    @IsString()
    @IsNotEmpty()
    category!: string;

    @ApiProperty({ description: 'Customer question.', example: 'What is the minimum loan amount?' })
    @IsString()
    @IsNotEmpty()
    question!: string;

    @ApiProperty({ description: 'Reference answer.', example: 'The minimum loan amount is PKR 50,000.' })
    @IsString()
    @IsNotEmpty()
    answer!: string;
}
