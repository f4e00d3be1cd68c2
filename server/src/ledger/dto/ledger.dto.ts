import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsNotEmpty,
	IsNumberString,
	IsOptional,
	IsString,
} from "class-validator";

export class GrantAllowanceInDto {
	@ApiProperty({ example: "GOLD" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({
		description: "New allowance for the escrow; replaces the previous one",
		example: "1000",
	})
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class TransferInDto {
	@ApiProperty({ example: "GOLD" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: "bob" })
	@IsString()
	@IsNotEmpty()
	to!: string;

	@ApiProperty({ example: "10" })
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class MintInDto {
	@ApiProperty({ example: "GOLD" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiPropertyOptional({ description: "Defaults to the caller", example: "alice" })
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	to?: string;

	@ApiProperty({ example: "10000" })
	@IsNumberString({ no_symbols: true })
	amount!: string;
}

export class BalanceDto {
	@ApiProperty({ example: "GOLD" })
	asset!: string;

	@ApiProperty({ example: "alice" })
	owner!: string;

	@ApiProperty({ description: "Decimal string", example: "9000" })
	balance!: string;

	@ApiProperty({
		description: "What the escrow may still pull from the owner",
		example: "1000",
	})
	allowance!: string;
}
