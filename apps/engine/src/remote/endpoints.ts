export const DEFAULT_ENDPOINTS = {
    createDraft: '/v1/draft/create',
    draftInfo: '/v1/draft/create/info',
    timeslotInfo: '/v1/draft/timeslot/info',
    setDraftTimeslot: '/v1/draft/timeslot/set',
    createSupply: '/v1/draft/supply/create',
    supplyStatus: '/v1/draft/supply/create/status',
    orderGet: '/v2/supply-order/get',
    orderTimeslotUpdate: '/v1/supply-order/timeslot/update',
    createCargoes: '/v1/cargoes/create',
    cargoInfo: '/v2/cargoes/create/info',
    createLabels: '/v1/cargoes-label/create',
    labelsInfo: '/v1/cargoes-label/get',
    labelFile: '/v1/cargoes-label/file/',
} as const;

export type EndpointName = keyof typeof DEFAULT_ENDPOINTS;
export type EndpointMap = Record<EndpointName, string>;
