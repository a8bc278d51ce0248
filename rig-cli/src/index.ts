#!/usr/bin/env node

import rigLayoutCLIMainFunction from './main';

rigLayoutCLIMainFunction();
