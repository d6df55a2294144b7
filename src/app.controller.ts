import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  index() {
    return {
      name: 'Dubai Property Price Prediction API',
      version: process.env.npm_package_version ?? '1.0.0',
      endpoints: {
        health: 'GET /health',
        predict: 'POST /predict',
        batch: 'POST /predict/batch',
        batch_csv: 'POST /predict/batch/csv',
        batch_template: 'GET /predict/batch/template',
        form_policy: 'GET /predict/form-policy?usage=&type=&subtype=',
        size_suggestion: 'GET /predict/size-suggestion?bedrooms=',
        areas: 'GET /reference/areas',
        validation_rules: 'GET /reference/validation-rules',
        reload: 'POST /reference/reload',
        model_info: 'GET /model/info',
      },
    };
  }
}
