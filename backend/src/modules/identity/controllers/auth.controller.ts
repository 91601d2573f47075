import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { AuthService } from '../services/auth.service';
import { UsersService } from '../services/users.service';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import {
  AuthResponseDto,
  LoginDto,
  RegisterDto,
  RegisterVendorDto,
  toUserResponse,
  UpdateMeDto,
  UserResponseDto,
} from '../dto/auth.dto';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly usersService: UsersService,
  ) {}

  @Post('register')
  @UseGuards(ThrottlerGuard)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Register',
    description: 'Creates a user or vendor account. Vendor profiles start pending.',
  })
  @ApiResponse({ status: 201, description: 'Account created', type: UserResponseDto })
  @ApiResponse({ status: 409, description: 'Email already registered' })
  async register(@Body() dto: RegisterDto): Promise<UserResponseDto> {
    return this.authService.register(dto);
  }

  @Post('register-vendor')
  @UseGuards(ThrottlerGuard)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Register vendor',
    description: 'Creates a vendor account with company details',
  })
  @ApiResponse({ status: 201, description: 'Vendor account created', type: UserResponseDto })
  @ApiResponse({ status: 409, description: 'Email already registered' })
  async registerVendor(@Body() dto: RegisterVendorDto): Promise<UserResponseDto> {
    return this.authService.registerVendor(dto);
  }

  @Post('login')
  @UseGuards(ThrottlerGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Login',
    description: 'Verifies credentials and returns an access token',
  })
  @ApiResponse({ status: 200, description: 'Authentication successful', type: AuthResponseDto })
  @ApiResponse({ status: 401, description: 'Invalid credentials' })
  @ApiResponse({ status: 429, description: 'Too many attempts' })
  async login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    return this.authService.login(dto);
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Get current account' })
  async me(@CurrentUser('id') userId: string): Promise<UserResponseDto> {
    return toUserResponse(await this.usersService.findById(userId));
  }

  @Put('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update own name or password' })
  @ApiResponse({ status: 401, description: 'Current password is incorrect' })
  async updateMe(
    @CurrentUser('id') userId: string,
    @Body() dto: UpdateMeDto,
  ): Promise<UserResponseDto> {
    return toUserResponse(await this.usersService.updateSelf(userId, dto));
  }
}
