import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

export const BOOKING_PROTO = 'booking.service.proto';
export const HEALTH_PROTO = 'health.service.proto';
export const BOOKING_SERVICE = 'supplybook.BookingService';
export const HEALTH_SERVICE = 'grpc.health.v1.Health';

export const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

type ProtoNode = grpc.GrpcObject[string];

function isNamespace(node: ProtoNode): node is grpc.GrpcObject {
    return typeof node === 'object' && !('fileDescriptorProtos' in node);
}

export function protoPath(file: string): string {
    return require.resolve(`@supplybook/proto/${file}`);
}

export function loadPackageDefinition(file: string): protoLoader.PackageDefinition {
    return protoLoader.loadSync(protoPath(file), protoOptions);
}

/** Walks a loaded package down a dotted name such as `supplybook.BookingService`. */
export function lookupService(root: grpc.GrpcObject, name: string): grpc.ServiceDefinition {
    let node: ProtoNode = root;
    for (const part of name.split('.')) {
        if (!isNamespace(node)) {
            throw new Error(`proto path ${name}: "${part}" is not inside a namespace`);
        }
        const next: ProtoNode | undefined = node[part];
        if (!next) {
            throw new Error(`proto path ${name}: "${part}" not found`);
        }
        node = next;
    }
    if (typeof node !== 'function') {
        throw new Error(`proto path ${name} is not a service`);
    }
    return node.service;
}

export function loadService(file: string, name: string): grpc.ServiceDefinition {
    return lookupService(grpc.loadPackageDefinition(loadPackageDefinition(file)), name);
}
