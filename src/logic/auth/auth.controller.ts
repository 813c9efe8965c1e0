import { Body, Controller, Get, HttpCode, Post, Request, UseGuards } from '@nestjs/common';
import { AuthUser, DepartmentTag } from '../../utils/types';
import { AccessPolicyService } from '../access-policy/access-policy.service';
import { AuthService, LoginResponse } from './auth.service';
import { CreateUserDto, LoginDto } from './dto/auth.dto';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

@Controller()
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly accessPolicy: AccessPolicyService,
  ) {}

  @Post('login')
  @HttpCode(200)
  async login(@Body() loginDto: LoginDto): Promise<LoginResponse> {
    return this.authService.login(loginDto);
  }

  @Post('add-user')
  @UseGuards(JwtAuthGuard)
  async addUser(@Request() req: { user: AuthUser }, @Body() dto: CreateUserDto) {
    return this.authService.addUser(req.user, dto);
  }

  @Get('user/accessible-data')
  @UseGuards(JwtAuthGuard)
  accessibleData(@Request() req: { user: AuthUser }): { accessible_data: DepartmentTag[] } {
    return { accessible_data: this.accessPolicy.accessibleDepartments(req.user.role) };
  }
}
