import { Body, Controller, Get, Patch, UseGuards } from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../../auth/auth.guard";
import { UserFromJwt } from "../../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	AdminConfigDto,
	TransferOwnershipInDto,
	UpdateFeeInDto,
	UpdateTreasuryInDto,
} from "./dto/admin-config.dto";
import { AdminService } from "./admin.service";

@ApiTags("Admin")
@ApiExtraModels(ApiEnvelopeShellDto, AdminConfigDto)
@ApiBearerAuth()
@UseGuards(AuthGuard)
@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
@Controller("api/admin/v1")
export class AdminController {
	constructor(private readonly adminService: AdminService) {}

	@ApiOperation({ summary: "Current owner, treasury and fee" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminConfigDto) })
	@Get("config")
	config(): ApiEnvelope<AdminConfigDto> {
		return envelope(this.adminService.getConfig());
	}

	@ApiOperation({ summary: "Change where fees are paid" })
	@ApiBody({ type: UpdateTreasuryInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminConfigDto) })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiBadRequestResponse({ description: "Null treasury" })
	@Patch("config/treasury")
	async setTreasury(
		@Body() dto: UpdateTreasuryInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<AdminConfigDto>> {
		const data = await this.adminService.setTreasury(identity, dto.treasury);
		return envelope(data);
	}

	@ApiOperation({ summary: "Change the fee applied to future approvals" })
	@ApiBody({ type: UpdateFeeInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminConfigDto) })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiBadRequestResponse({ description: "Fee outside 0-100" })
	@Patch("config/fee")
	async setFeePercent(
		@Body() dto: UpdateFeeInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<AdminConfigDto>> {
		const data = await this.adminService.setFeePercent(identity, dto.feePercent);
		return envelope(data);
	}

	@ApiOperation({ summary: "Hand the config over to a new owner" })
	@ApiBody({ type: TransferOwnershipInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AdminConfigDto) })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiBadRequestResponse({ description: "Null owner" })
	@Patch("config/owner")
	async transferOwnership(
		@Body() dto: TransferOwnershipInDto,
		@UserFromJwt() identity: string,
	): Promise<ApiEnvelope<AdminConfigDto>> {
		const data = await this.adminService.transferOwnership(identity, dto.owner);
		return envelope(data);
	}
}
