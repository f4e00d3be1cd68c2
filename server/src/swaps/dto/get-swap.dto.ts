import { ApiProperty } from "@nestjs/swagger";
import { SWAP_STATUS, type SwapAction, type SwapStatus } from "@swap-escrow/sdk";

export class GetSwapDto {
	@ApiProperty({ example: 0 })
	id!: number;

	@ApiProperty({ example: "alice" })
	requester!: string;

	@ApiProperty({ example: "bob" })
	recipient!: string;

	@ApiProperty({ example: "GOLD" })
	offerAsset!: string;

	@ApiProperty({ description: "Decimal string", example: "1000" })
	offerAmount!: string;

	@ApiProperty({ example: "SILVER" })
	receiveAsset!: string;

	@ApiProperty({ description: "Decimal string", example: "2000" })
	receiveAmount!: string;

	@ApiProperty({ enum: [...SWAP_STATUS] })
	status!: SwapStatus;

	@ApiProperty({
		description: "Actions still possible on this request",
		enum: ["approve", "reject", "cancel"],
		isArray: true,
	})
	allowedActions!: SwapAction[];
}
