import { ApiProperty } from "@nestjs/swagger";

export class SwapEventDto {
	@ApiProperty({ example: "swap.request.status-changed" })
	type!: string;

	@ApiProperty({
		description: "Event fields, amounts as decimal strings",
		example: { id: 0, newStatus: "Approved" },
	})
	payload!: Record<string, unknown>;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;
}
