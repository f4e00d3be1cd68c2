import { ApiProperty } from "@nestjs/swagger";

export class DisbursementDto {
	@ApiProperty({ example: "GOLD" })
	asset!: string;

	@ApiProperty({ example: "bob" })
	to!: string;

	@ApiProperty({ description: "Decimal string", example: "950" })
	amount!: string;
}

export class SwapQuoteDto {
	@ApiProperty({ example: 0 })
	requestId!: number;

	@ApiProperty({ description: "Fee rate used for this quote", example: 5 })
	feePercent!: number;

	@ApiProperty({ description: "Fee on the offer leg", example: "50" })
	offerFee!: string;

	@ApiProperty({ description: "Fee on the receive leg", example: "100" })
	receiveFee!: string;

	@ApiProperty({ type: [DisbursementDto] })
	disbursements!: DisbursementDto[];
}
