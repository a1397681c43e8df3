#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { YieldAdvisorStack } from './yield-advisor-stack';

const app = new cdk.App();

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
};
const stage = process.env.STAGE || 'development';

new YieldAdvisorStack(app, 'YieldAdvisorStack', {
  env,
  stage,
  description: 'Maize yield advisor - weather acquisition, yield prediction and recommendations',
  tags: {
    Project: 'YieldAdvisor',
    Environment: stage,
  },
});

app.synth();
