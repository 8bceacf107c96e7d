import { INestApplication, ValidationPipe } from '@nestjs/common';
import {
  DomainExceptionFilter,
} from './common/filters/domain-exception.filter';

/** Pipes and filters shared by the server and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.enableCors({
    origin: '*',
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    credentials: true,
  });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new DomainExceptionFilter());
  return app;
}
