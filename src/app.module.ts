import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { VendingModule } from './modules';
import {
  EnvironmentVariables,
  createVendingConfig,
  validateEnvironment,
} from './config/environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    VendingModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        createVendingConfig(configService),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
