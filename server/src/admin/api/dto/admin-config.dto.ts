import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString } from "class-validator";

export class AdminConfigDto {
	@ApiProperty({ description: "Identity allowed to change the config", example: "admin" })
	owner!: string;

	@ApiProperty({ description: "Identity receiving fees", example: "treasury" })
	treasury!: string;

	@ApiProperty({ description: "Fee taken from each leg, in percent", example: 5 })
	feePercent!: number;

	@ApiProperty({ description: "Identity the escrow holds custody under", example: "swap-escrow" })
	custodian!: string;
}

export class UpdateTreasuryInDto {
	@ApiProperty({ example: "treasury-2" })
	@IsString()
	@IsNotEmpty()
	treasury!: string;
}

export class UpdateFeeInDto {
	@ApiProperty({ minimum: 0, maximum: 100, example: 3 })
	@IsInt()
	feePercent!: number;
}

export class TransferOwnershipInDto {
	@ApiProperty({ example: "admin-2" })
	@IsString()
	@IsNotEmpty()
	owner!: string;
}
