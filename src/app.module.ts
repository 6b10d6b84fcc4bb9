import { Module } from '@nestjs/common';
import { AnalysisModule } from './analysis/analysis.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';

@Module({
  imports: [AnalysisModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
