/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import {type Contract} from 'fabric-contract-api';
import { FarmerRegistryContract } from './contracts/FarmerRegistryContract';
import { PracticeLogContract } from './contracts/PracticeLogContract';

export { FarmerRegistryContract, PracticeLogContract };

export const contracts: typeof Contract[] = [
    FarmerRegistryContract,
    PracticeLogContract,
];
