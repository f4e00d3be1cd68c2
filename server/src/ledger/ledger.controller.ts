import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import {
	BalanceDto,
	GrantAllowanceInDto,
	MintInDto,
	TransferInDto,
} from "./dto/ledger.dto";
import { LedgerService } from "./ledger.service";

@ApiTags("2 - Ledger")
@ApiExtraModels(ApiEnvelopeShellDto, BalanceDto)
@ApiBearerAuth()
@UseGuards(AuthGuard)
@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly ledgerService: LedgerService) {}

	@Get("balances/:asset")
	@ApiOperation({ summary: "Caller's balance and allowance to the escrow" })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceDto) })
	balance(
		@Param("asset") asset: string,
		@UserFromJwt() identity: string,
	): ApiEnvelope<BalanceDto> {
		return envelope(this.ledgerService.balanceOf(asset, identity));
	}

	@Post("allowances")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Let the escrow pull up to an amount" })
	@ApiBody({ type: GrantAllowanceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceDto) })
	async grantAllowance(
		@Body() dto: GrantAllowanceInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<BalanceDto>> {
		const data = await this.ledgerService.grantAllowance(dto, identity);
		return envelope(data);
	}

	@Post("transfers")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({
		summary: "Direct transfer; refused when addressed to the escrow",
	})
	@ApiBody({ type: TransferInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceDto) })
	@ApiBadRequestResponse({ description: "Escrow refused the transfer" })
	async transfer(
		@Body() dto: TransferInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<BalanceDto>> {
		const data = await this.ledgerService.transfer(dto, identity);
		return envelope(data);
	}

	@Post("mint")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Test faucet, only when LEDGER_FAUCET_ENABLED" })
	@ApiBody({ type: MintInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceDto) })
	@ApiNotFoundResponse({ description: "Faucet is disabled" })
	async mint(
		@Body() dto: MintInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<BalanceDto>> {
		const data = await this.ledgerService.mint(dto, identity);
		return envelope(data);
	}
}
