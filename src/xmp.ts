/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { type MetadataRequest, type MetadataValue, presentKeys } from './metadata';
import { textDecoder, textEncoder } from './misc';

// https://developer.adobe.com/xmp/docs/XMPSpecifications/

export const XMP_NAMESPACES: Record<string, string> = {
	dc: 'http://purl.org/dc/elements/1.1/',
	xmp: 'http://ns.adobe.com/xap/1.0/',
	xmpRights: 'http://ns.adobe.com/xap/1.0/rights/',
	xmpMM: 'http://ns.adobe.com/xap/1.0/mm/',
	xmpDM: 'http://ns.adobe.com/xmp/1.0/DynamicMedia/',
	photoshop: 'http://ns.adobe.com/photoshop/1.0/',
	exif: 'http://ns.adobe.com/exif/1.0/',
	tiff: 'http://ns.adobe.com/tiff/1.0/',
	Iptc4xmpCore: 'http://iptc.org/std/Iptc4xmpCore/1.0/xmlns/',
};

const RDF_NAMESPACE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

export type XmpArrayType = 'Alt' | 'Seq' | 'Bag';

export interface XmpProperty {
	prefix: string;
	name: string;
	/** How the value is wrapped; null for a simple property. */
	arrayType: XmpArrayType | null;
	value: string;
}

/** Where the unprefixed `XMP:<Name>` keys end up. Everything else lands in the `xmp` namespace. */
const DEFAULT_PLACEMENT: Record<string, Omit<XmpProperty, 'value'>> = {
	Title: { prefix: 'dc', name: 'title', arrayType: 'Alt' },
	Description: { prefix: 'dc', name: 'description', arrayType: 'Alt' },
	Rights: { prefix: 'dc', name: 'rights', arrayType: 'Alt' },
	Copyright: { prefix: 'dc', name: 'rights', arrayType: 'Alt' },
	Creator: { prefix: 'dc', name: 'creator', arrayType: 'Seq' },
	Artist: { prefix: 'dc', name: 'creator', arrayType: 'Seq' },
	Subject: { prefix: 'dc', name: 'subject', arrayType: 'Bag' },
	Keywords: { prefix: 'dc', name: 'subject', arrayType: 'Bag' },
};

const XML_NAME_REGEX = /^[A-Za-z_][\w.-]*$/;
const EXPLICIT_NAMESPACE_REGEX = /^XMP-([A-Za-z_][\w.-]*):(.+)$/;

export const isXmpKey = (key: string) => key.startsWith('XMP:') || EXPLICIT_NAMESPACE_REGEX.test(key);

export const hasXmpKeys = (request: MetadataRequest) => presentKeys(request).some(isXmpKey);

export const escapeXml = (text: string) => {
	return text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;');
};

const xmpValueText = (key: string, value: MetadataValue) => {
	if (typeof value === 'string') {
		return value;
	} else if (typeof value === 'number') {
		return String(value);
	} else if (typeof value === 'boolean') {
		return value ? 'True' : 'False';
	}

	throw new TypeError(`request['${key}'] can't be written to XMP as binary data.`);
};

const sameProperty = (a: { prefix: string; name: string }, b: { prefix: string; name: string }) => {
	return a.prefix === b.prefix && a.name === b.name;
};

export const namespaceUri = (prefix: string) => {
	return Object.hasOwn(XMP_NAMESPACES, prefix)
		? XMP_NAMESPACES[prefix]
		: `http://ns.adobe.com/${prefix}/1.0/`;
};

/** Maps the XMP keys of a request onto properties. The first key reaching a property wins. */
export const collectXmpProperties = (request: MetadataRequest) => {
	const properties: XmpProperty[] = [];

	for (const key of presentKeys(request)) {
		const value = request[key];
		if (value === null || value === undefined || !isXmpKey(key)) {
			continue;
		}

		let property: Omit<XmpProperty, 'value'>;
		const explicit = EXPLICIT_NAMESPACE_REGEX.exec(key);
		if (explicit) {
			property = { prefix: explicit[1], name: explicit[2], arrayType: null };
		} else {
			const name = key.slice('XMP:'.length);
			property = Object.hasOwn(DEFAULT_PLACEMENT, name)
				? DEFAULT_PLACEMENT[name]
				: { prefix: 'xmp', name, arrayType: null };
		}

		if (!XML_NAME_REGEX.test(property.name)) {
			throw new TypeError(`request key '${key}' doesn't name a valid XMP property.`);
		}

		if (properties.some(x => sameProperty(x, property))) {
			continue;
		}

		properties.push({ ...property, value: xmpValueText(key, value) });
	}

	return properties;
};

/** A property of an existing packet, carried over as the XML it was stored as. */
export interface StoredXmpProperty {
	prefix: string;
	name: string;
	xml: string;
}

/** What an existing packet declares: its namespace prefixes and its top-level properties, in document order. */
export interface StoredXmp {
	namespaces: Map<string, string>;
	properties: StoredXmpProperty[];
}

const NAMESPACE_DECLARATION_REGEX = /xmlns:([A-Za-z_][\w.-]*)\s*=\s*(["'])(.*?)\2/g;
const DESCRIPTION_REGEX = /<rdf:Description\b([^>]*?)(?:\/>|>([\s\S]*?)<\/rdf:Description\s*>)/g;
const ATTRIBUTE_REGEX = /([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)\s*=\s*(["'])(.*?)\3/g;
const CHILD_ELEMENT_REGEX = /<([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)\b(?:[^>]*?\/>|[^>]*>[\s\S]*?<\/\1:\2\s*>)/g;
const STRUCTURAL_PREFIXES = ['xmlns', 'xml', 'rdf', 'x'];

/**
 * Collects the properties of existing packets. Properties stored as attributes of `rdf:Description` become elements;
 * element properties are kept verbatim, whatever their structure. When packets repeat a property, the first wins.
 */
export const readXmpProperties = (packets: Uint8Array[]): StoredXmp => {
	const namespaces = new Map<string, string>();
	const properties: StoredXmpProperty[] = [];

	const add = (property: StoredXmpProperty) => {
		if (!properties.some(x => sameProperty(x, property))) {
			properties.push(property);
		}
	};

	for (const packet of packets) {
		const text = textDecoder.decode(packet);

		for (const [, prefix, , uri] of text.matchAll(NAMESPACE_DECLARATION_REGEX)) {
			if (!namespaces.has(prefix)) {
				namespaces.set(prefix, uri);
			}
		}

		for (const description of text.matchAll(DESCRIPTION_REGEX)) {
			for (const [, prefix, name, , value] of description[1].matchAll(ATTRIBUTE_REGEX)) {
				if (!STRUCTURAL_PREFIXES.includes(prefix)) {
					add({ prefix, name, xml: `<${prefix}:${name}>${value}</${prefix}:${name}>` });
				}
			}

			const body = description[2] ?? '';
			for (const element of body.matchAll(CHILD_ELEMENT_REGEX)) {
				add({ prefix: element[1], name: element[2], xml: element[0] });
			}
		}
	}

	return { namespaces, properties };
};

const EMPTY_STORED_XMP: StoredXmp = { namespaces: new Map(), properties: [] };

const writeProperty = (lines: string[], property: XmpProperty) => {
	const tag = `${property.prefix}:${property.name}`;
	const value = escapeXml(property.value);

	if (property.arrayType === null) {
		lines.push(`   <${tag}>${value}</${tag}>`);
		return;
	}

	const item = property.arrayType === 'Alt'
		? `<rdf:li xml:lang="x-default">${value}</rdf:li>`
		: `<rdf:li>${value}</rdf:li>`;

	lines.push(
		`   <${tag}>`,
		`    <rdf:${property.arrayType}>`,
		`     ${item}`,
		`    </rdf:${property.arrayType}>`,
		`   </${tag}>`,
	);
};

/**
 * Serializes the properties into a complete, read-only xpacket. Stored properties keep their place and are replaced
 * by a new property of the same name; new properties that replace nothing follow them.
 */
export const createXmpPacket = (properties: XmpProperty[], stored = EMPTY_STORED_XMP) => {
	const added = properties.filter(property => !stored.properties.some(x => sameProperty(x, property)));
	const used = [...stored.properties, ...added];
	const prefixes = [...new Set(used.map(x => x.prefix))];

	const lines = [
		'<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
		'<x:xmpmeta xmlns:x="adobe:ns:meta/">',
		` <rdf:RDF xmlns:rdf="${RDF_NAMESPACE}">`,
		'  <rdf:Description rdf:about=""',
		...prefixes.map(prefix => `    xmlns:${prefix}="${escapeXml(stored.namespaces.get(prefix) ?? namespaceUri(prefix))}"`),
		'  >',
	];

	for (const storedProperty of stored.properties) {
		const replacement = properties.find(x => sameProperty(x, storedProperty));
		if (replacement) {
			writeProperty(lines, replacement);
		} else {
			lines.push(`   ${storedProperty.xml}`);
		}
	}

	for (const property of added) {
		writeProperty(lines, property);
	}

	lines.push(
		'  </rdf:Description>',
		' </rdf:RDF>',
		'</x:xmpmeta>',
		'<?xpacket end="w"?>',
	);

	return textEncoder.encode(lines.join('\n'));
};

/**
 * Returns the encoded packet, merged over the properties of `stored`, or null if the request has no XMP keys.
 */
export const buildXmpPacket = (request: MetadataRequest, stored = EMPTY_STORED_XMP) => {
	const properties = collectXmpProperties(request);
	if (properties.length === 0) {
		return null;
	}

	return createXmpPacket(properties, stored);
};
