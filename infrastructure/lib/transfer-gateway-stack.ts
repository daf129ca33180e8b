import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as logs from 'aws-cdk-lib/aws-logs';
import { NodejsFunction, OutputFormat } from 'aws-cdk-lib/aws-lambda-nodejs';
import type { Construct } from 'constructs';
import { fileURLToPath } from 'url';

export interface TransferGatewayStackProps extends cdk.StackProps {
  /**
   * Destination and service configuration, as JSON. Handed to every
   * handler in the TRANSFER_CONFIG environment variable.
   */
  transferConfig: string;
}

interface HandlerDefinition {
  id: string;
  file: string;
  description: string;
}

// ESM bundles still contain CommonJS dependencies of axios
const REQUIRE_SHIM = "import { createRequire } from 'module'; const require = createRequire(import.meta.url);";

export class TransferGatewayStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: TransferGatewayStackProps) {
    super(scope, id, props);

    const createHandler = (definition: HandlerDefinition): NodejsFunction =>
      new NodejsFunction(this, definition.id, {
        entry: fileURLToPath(new URL(`../../backend/src/lambda/${definition.file}.ts`, import.meta.url)),
        handler: 'handler',
        runtime: lambda.Runtime.NODEJS_20_X,
        timeout: cdk.Duration.seconds(30),
        memorySize: 256,
        environment: {
          TRANSFER_CONFIG: props.transferConfig,
          NODE_OPTIONS: '--enable-source-maps',
        },
        bundling: {
          format: OutputFormat.ESM,
          target: 'node20',
          sourceMap: true,
          banner: REQUIRE_SHIM,
        },
        logRetention: logs.RetentionDays.ONE_WEEK,
        description: definition.description,
      });

    const startTransferFunction = createHandler({
      id: 'StartTransferFunction',
      file: 'startTransferHandler',
      description: 'Starts a transfer on the service for the requested destination',
    });
    const findTransfersFunction = createHandler({
      id: 'FindTransfersFunction',
      file: 'findTransfersHandler',
      description: 'Finds transfers matching search criteria',
    });
    const transferInfoFunction = createHandler({
      id: 'TransferInfoFunction',
      file: 'transferInfoHandler',
      description: 'Returns the details of a transfer',
    });
    const transferInfoFieldFunction = createHandler({
      id: 'TransferInfoFieldFunction',
      file: 'transferInfoFieldHandler',
      description: 'Returns a single field from the details of a transfer',
    });
    const cancelTransferFunction = createHandler({
      id: 'CancelTransferFunction',
      file: 'cancelTransferHandler',
      description: 'Cancels a transfer',
    });

    // API Gateway REST API
    const api = new apigateway.RestApi(this, 'TransferGatewayApi', {
      restApiName: 'Data Transfer Gateway API',
      description: 'Uniform API for bulk data transfers',
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: apigateway.Cors.ALL_METHODS,
        allowHeaders: ['Content-Type', 'Authorization'],
      },
      deployOptions: {
        stageName: 'prod',
        throttlingRateLimit: 10, // 10 requests per second
        throttlingBurstLimit: 20, // 20 concurrent requests
      },
    });

    const integrate = (fn: lambda.IFunction) =>
      new apigateway.LambdaIntegration(fn, {
        timeout: cdk.Duration.seconds(29), // API Gateway max timeout
        proxy: true,
      });

    // /transfers
    const transfersResource = api.root.addResource('transfers');
    transfersResource.addMethod('POST', integrate(startTransferFunction));
    transfersResource.addMethod('GET', integrate(findTransfersFunction));

    // /transfer/{jobId}
    const transferResource = api.root.addResource('transfer').addResource('{jobId}');
    transferResource.addMethod('GET', integrate(transferInfoFunction));
    transferResource.addMethod('DELETE', integrate(cancelTransferFunction));

    // /transfer/{jobId}/{fieldName}
    transferResource.addResource('{fieldName}').addMethod('GET', integrate(transferInfoFieldFunction));

    const functions: Array<[string, NodejsFunction]> = [
      ['StartTransfer', startTransferFunction],
      ['FindTransfers', findTransfersFunction],
      ['TransferInfo', transferInfoFunction],
      ['TransferInfoField', transferInfoFieldFunction],
      ['CancelTransfer', cancelTransferFunction],
    ];

    for (const [name, fn] of functions) {
      fn.metricErrors({
        period: cdk.Duration.minutes(5),
        statistic: 'Sum',
      }).createAlarm(this, `${name}ErrorAlarm`, {
        threshold: 5,
        evaluationPeriods: 1,
        alarmDescription: `Alert when the ${name} Lambda has 5 or more errors in 5 minutes`,
        alarmName: `TransferGateway-${name}-Errors`,
      });

      fn.metricThrottles({
        period: cdk.Duration.minutes(5),
        statistic: 'Sum',
      }).createAlarm(this, `${name}ThrottleAlarm`, {
        threshold: 3,
        evaluationPeriods: 1,
        alarmDescription: `Alert when the ${name} Lambda is throttled 3 or more times in 5 minutes`,
        alarmName: `TransferGateway-${name}-Throttles`,
      });

      new cdk.CfnOutput(this, `${name}LambdaName`, {
        value: fn.functionName,
        description: `${name} Lambda function name`,
      });
    }

    // Output API endpoint
    new cdk.CfnOutput(this, 'ApiEndpoint', {
      value: api.url,
      description: 'API Gateway endpoint URL',
    });
  }
}
