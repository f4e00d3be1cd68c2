import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseIntPipe,
	Patch,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForArrayDto,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { CreateSwapInDto } from "./dto/create-swap.dto";
import { GetSwapDto } from "./dto/get-swap.dto";
import { DisbursementDto, SwapQuoteDto } from "./dto/swap-quote.dto";
import { SwapEventDto } from "./dto/swap-event.dto";
import { SwapsService } from "./swaps.service";

@ApiTags("1 - Swaps")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	GetSwapDto,
	SwapQuoteDto,
	DisbursementDto,
	SwapEventDto,
)
@Controller("api/v1/swaps")
export class SwapsController {
	constructor(
		private readonly swapsService: SwapsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiBearerAuth()
	@ApiBody({ type: CreateSwapInDto })
	@ApiCreatedResponse({
		description: "Offer taken into custody",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiBadRequestResponse({ description: "Invalid terms" })
	@ApiUnprocessableEntityResponse({
		description: "Offer could not be pulled (balance or allowance)",
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@UseGuards(AuthGuard)
	@ApiOperation({ summary: "Create a swap request, depositing the offer" })
	async create(
		@Body() dto: CreateSwapInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<GetSwapDto>> {
		const data = await this.swapsService.create(dto, identity);
		return envelope(data);
	}

	@Get("mine")
	@ApiBearerAuth()
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of the caller's requests, newest first",
		schema: getSchemaPathForPaginatedDto(GetSwapDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@UseGuards(AuthGuard)
	@ApiOperation({
		summary: "Requests where the caller is requester or recipient",
	})
	getMine(
		@UserFromJwt() identity: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): ApiPaginatedEnvelope<GetSwapDto[]> {
		const { items, nextCursor, total } = this.swapsService.getByParty(
			identity,
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("sse")
	@ApiOperation({ summary: "Live swap and config notifications" })
	sse(): Observable<SseEvent> {
		return this.sseService.allEvents.pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":id")
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOkResponse({
		description: "One swap request",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiOperation({ summary: "Get a swap request by id" })
	getOne(@Param("id", ParseIntPipe) id: number): ApiEnvelope<GetSwapDto> {
		return envelope(this.swapsService.getById(id));
	}

	@Get(":id/quote")
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOkResponse({
		description: "Payouts an approval would make at the current fee",
		schema: getSchemaPathForDto(SwapQuoteDto),
	})
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiConflictResponse({ description: "Request is no longer pending" })
	@ApiOperation({ summary: "Quote the settlement of a pending request" })
	quote(@Param("id", ParseIntPipe) id: number): ApiEnvelope<SwapQuoteDto> {
		return envelope(this.swapsService.quote(id));
	}

	@Get(":id/history")
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOkResponse({
		description: "Recorded notifications for this request, oldest first",
		schema: getSchemaPathForArrayDto(SwapEventDto),
	})
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiOperation({ summary: "Audit trail of a swap request" })
	async history(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<SwapEventDto[]>> {
		const data = await this.swapsService.history(id);
		return envelope(data);
	}

	@Patch(":id/approve")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOperation({
		summary:
			"Approve as the recipient: deposit the receive leg and settle both legs minus fees",
	})
	@ApiOkResponse({
		description: "Request approved",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the recipient" })
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiConflictResponse({ description: "Request is no longer pending" })
	@ApiUnprocessableEntityResponse({ description: "A transfer failed" })
	async approve(
		@Param("id", ParseIntPipe) id: number,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<GetSwapDto>> {
		const data = await this.swapsService.approve(id, identity);
		return envelope(data);
	}

	@Patch(":id/reject")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOperation({
		summary: "Reject as the recipient: the offer goes back to the requester",
	})
	@ApiOkResponse({
		description: "Request rejected",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the recipient" })
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiConflictResponse({ description: "Request is no longer pending" })
	async reject(
		@Param("id", ParseIntPipe) id: number,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<GetSwapDto>> {
		const data = await this.swapsService.reject(id, identity);
		return envelope(data);
	}

	@Patch(":id/cancel")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiParam({ name: "id", description: "Swap request id" })
	@ApiOperation({
		summary: "Cancel as the requester and get the offer back",
	})
	@ApiOkResponse({
		description: "Request cancelled",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the requester" })
	@ApiNotFoundResponse({ description: "Swap request not found" })
	@ApiConflictResponse({ description: "Request is no longer pending" })
	async cancel(
		@Param("id", ParseIntPipe) id: number,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<GetSwapDto>> {
		const data = await this.swapsService.cancel(id, identity);
		return envelope(data);
	}
}
