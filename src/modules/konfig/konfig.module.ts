import { Module, Provider, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ApiKeyAuthenticator } from '../../auth/authenticators/api-key.authenticator';
import { BearerTokenAuthenticator } from '../../auth/authenticators/bearer-token.authenticator';
import { AuthenticationGateway } from '../../auth/authentication-gateway.service';
import { AuthorizationPolicyService } from '../../auth/authorization-policy.service';
import { DATABASE_ENTITIES } from '../../config/database.config';
import { getSecuritySettings, SECURITY_SETTINGS } from '../../config/security.config';
import { ApiKeysController } from '../../controllers/api-keys.controller';
import { AuthController } from '../../controllers/auth.controller';
import { ConfigsController } from '../../controllers/configs.controller';
import { HealthController } from '../../controllers/health.controller';
import { NamespacesController } from '../../controllers/namespaces.controller';
import { TenantController } from '../../controllers/tenant.controller';
import { UsersController } from '../../controllers/users.controller';
import { AuthGuard } from '../../guards/auth.guard';
import { MetricsInterceptor } from '../../interceptors/metrics.interceptor';
import { RateLimitInterceptor } from '../../interceptors/rate-limit.interceptor';
import { ApiKeyService } from '../../services/api-key.service';
import { AuthService } from '../../services/auth.service';
import { ConfigHistoryService } from '../../services/config-history.service';
import { ConfigStoreService } from '../../services/config-store.service';
import { CredentialService } from '../../services/credential.service';
import { EncryptionService } from '../../services/encryption.service';
import { MetricsService } from '../../services/metrics.service';
import { NamespaceService } from '../../services/namespace.service';
import { RedisService } from '../../services/redis.service';
import { TenantService } from '../../services/tenant.service';
import { TokenService } from '../../services/token.service';
import { UserService } from '../../services/user.service';

export const KONFIG_CONTROLLERS: Type<unknown>[] = [
  AuthController,
  TenantController,
  UsersController,
  ApiKeysController,
  NamespacesController,
  ConfigsController,
  HealthController,
];

/** Built once at startup, frozen, shared by encryption, hashing and tokens. */
export const securitySettingsProvider: Provider = {
  provide: SECURITY_SETTINGS,
  useFactory: getSecuritySettings,
  inject: [ConfigService],
};

export const KONFIG_PROVIDERS: Provider[] = [
  securitySettingsProvider,
  EncryptionService,
  CredentialService,
  TokenService,
  MetricsService,
  RedisService,
  TenantService,
  UserService,
  ApiKeyService,
  NamespaceService,
  ConfigHistoryService,
  ConfigStoreService,
  AuthService,
  AuthorizationPolicyService,
  ApiKeyAuthenticator,
  BearerTokenAuthenticator,
  AuthenticationGateway,
  AuthGuard,
  MetricsInterceptor,
  RateLimitInterceptor,
];

@Module({
  imports: [TypeOrmModule.forFeature(DATABASE_ENTITIES), JwtModule.register({})],
  controllers: KONFIG_CONTROLLERS,
  providers: KONFIG_PROVIDERS,
  exports: [MetricsService, MetricsInterceptor, RateLimitInterceptor],
})
export class KonfigModule {}
