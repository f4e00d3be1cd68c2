import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsNumberString, IsString } from "class-validator";

export class CreateSwapInDto {
	@ApiProperty({ description: "Identity allowed to approve or reject", example: "bob" })
	@IsString()
	@IsNotEmpty()
	recipient!: string;

	@ApiProperty({ description: "Asset the requester deposits", example: "GOLD" })
	@IsString()
	@IsNotEmpty()
	offerAsset!: string;

	@ApiProperty({
		description: "Amount deposited, in the asset's smallest unit",
		example: "1000",
	})
	@IsNumberString({ no_symbols: true })
	offerAmount!: string;

	@ApiProperty({ description: "Asset the requester wants back", example: "SILVER" })
	@IsString()
	@IsNotEmpty()
	receiveAsset!: string;

	@ApiProperty({
		description: "Amount wanted, in the asset's smallest unit",
		example: "2000",
	})
	@IsNumberString({ no_symbols: true })
	receiveAmount!: string;
}
